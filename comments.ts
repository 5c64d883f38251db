import { CodeFragment, FunctionSymbol, TranslationUnit } from "./symbols";

function leading(text : string) : number {
  return text.length - text.trimStart().length;
}

function toLineComment(text : string) : string {
  const at = text.indexOf("#");
  return `${text.slice(0, at)}//${text.slice(at + 1)}`;
}

// Source comments are not part of the tree, so they are matched back to the
// generated code by line once every body has been translated.
export function reattachComments(unit : TranslationUnit, lines : ReadonlyArray<string>) : void {
  const functions = [...unit.functions.values()];
  const owned = functions.filter((fn) => !fn.isEntry);
  const fragments = new Map<number, CodeFragment>();
  functions.forEach((fn) => {
    fn.orderedFragments().forEach((f) => {
      for (let line = f.startLine; line <= f.endLine; line++) fragments.set(line, f);
    });
  });

  lines.forEach((text, i) => {
    const line = i + 1;
    const fragment = fragments.get(line);
    if (fragment !== undefined) {
      if (fragment.endLine === line && fragment.reason === undefined) trailingComment(fragment, text);
      return;
    }
    const trimmed = text.trim();
    if (!trimmed.startsWith("#")) return;
    const fn : FunctionSymbol | undefined = owned.find((f) => f.spans(line));
    if (fn === undefined) {
      unit.entry.emit(new CodeFragment(line, line, text.length, 1, toLineComment(trimmed)));
      return;
    }
    // Indentation is kept relative to the enclosing definition.
    const base = leading(lines[fn.line - 1] ?? "");
    const kept = text.slice(Math.min(base, leading(text))).trimEnd();
    fn.emit(new CodeFragment(line, line, text.length, 0, toLineComment(kept)));
  });
}

function trailingComment(fragment : CodeFragment, text : string) : void {
  const rest = text.slice(fragment.endColumn).replace(/^[\s:;]*/, "");
  if (rest.startsWith("#")) fragment.comment = rest.slice(1).trim();
}
