import { ClassType, CodeFragment, FunctionSymbol, TranslationUnit } from "./symbols";
import { cppType } from "./types";

// Spaces per level, or one tab per level.
export type IndentUnit = number | "tab";

export type RenderOptions = { indent: IndentUnit };

class Printer {
  private readonly unit : string;

  constructor(indent : IndentUnit) {
    this.unit = indent === "tab" ? "\t" : " ".repeat(indent);
  }

  pad(level : number) : string {
    return this.unit.repeat(Math.max(level, 0));
  }

  fragment(f : CodeFragment, base : number) : Array<string> {
    const out : Array<string> = [];
    const prefix = this.pad(base + f.indent);
    if (f.code !== "") {
      const lines = f.code.split("\n").map((l) => `${prefix}${l}`);
      if (f.comment !== undefined) lines[lines.length - 1] += ` // ${f.comment}`;
      out.push(...lines);
    } else if (f.comment !== undefined) {
      out.push(`${prefix}// ${f.comment}`);
    }
    f.closers.forEach((level) => out.push(`${this.pad(base + level)}}`));
    return out;
  }

  body(fn : FunctionSymbol, base : number) : Array<string> {
    return fn.orderedFragments().flatMap((f) => this.fragment(f, base));
  }
}

function parameters(fn : FunctionSymbol, withDefaults : boolean) : string {
  return [...fn.params.values()]
    .map((p) => {
      const decl = `${cppType(p.type.tag)} ${p.name}`;
      return withDefaults && p.defaultValue !== undefined ? `${decl} = ${p.defaultValue}` : decl;
    })
    .join(", ");
}

function signature(fn : FunctionSymbol, withDefaults : boolean) : string {
  const params = parameters(fn, withDefaults);
  if (fn.isConstructor && fn.owner !== undefined) return `${fn.owner.name}(${params})`;
  return `${cppType(fn.returnType.tag)} ${fn.name}(${params})`;
}

function renderClass(cls : ClassType, p : Printer) : string {
  const bases = cls.bases.length === 0 ? "" : ` : ${cls.bases.map((b) => `public ${b}`).join(", ")}`;
  const lines = [`class ${cls.name}${bases} {`, "public:"];
  cls.attributes.forEach((a) => lines.push(`${p.pad(1)}${cppType(a.type.tag)} ${a.name};`));
  cls.collections().forEach((c) => lines.push(`${p.pad(1)}${c.typeName()} ${c.name};`));
  cls.methods.forEach((m) => {
    if (lines.length > 2) lines.push("");
    lines.push(`${p.pad(1)}${signature(m, true)} {`, ...p.body(m, 1), `${p.pad(1)}}`);
  });
  lines.push("};");
  return lines.join("\n");
}

function renderFunction(fn : FunctionSymbol, p : Printer) : string {
  return [`${signature(fn, false)} {`, ...p.body(fn, 0), "}"].join("\n");
}

function renderMain(entry : FunctionSymbol, p : Printer) : string {
  return ["int main(int argc, char **argv) {", ...p.body(entry, 0), `${p.pad(1)}return 0;`, "}"].join("\n");
}

/**
 * Lays out a translation unit as one C++ source file: includes, forward
 * declarations, classes, free functions and finally main().
 */
export function renderUnit(unit : TranslationUnit, options : RenderOptions) : string {
  const p = new Printer(options.indent);
  const classes = [...unit.classes.values()];
  const functions = [...unit.functions.values()].filter((fn) => fn.owner === undefined && !fn.isEntry);
  const sections = [
    [...unit.dependencies].map((d) => `#include <${d}>`).join("\n"),
    classes.map((c) => `class ${c.name};`).join("\n"),
    functions.map((fn) => `${signature(fn, true)};`).join("\n"),
    ...classes.map((c) => renderClass(c, p)),
    ...functions.map((fn) => renderFunction(fn, p)),
    renderMain(unit.entry, p)
  ];
  return `${sections.filter((s) => s !== "").join("\n\n")}\n`;
}
