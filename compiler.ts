import { Expr, Param, Stmt, StmtOf } from "./ast";
import { reattachComments } from "./comments";
import { fail, NotTranslatable } from "./errors";
import { translateLiteral } from "./expressions";
import { parse } from "./parser";
import { IndentUnit, renderUnit } from "./render";
import { Scope } from "./scope";
import { BlockContext, passThrough, translateBlock, translateStmt } from "./statements";
import { ClassType, CONSTRUCTOR, FunctionSymbol, Parameter, TranslationUnit } from "./symbols";
import { TypeSlot } from "./types";

export type CompileOptions = {
  filename?: string,
  indent?: IndentUnit
};

export type CompileResult = {
  unit: TranslationUnit,
  output: string
};

export function compile(source : string, options : CompileOptions = {}) : CompileResult {
  const unit = translateProgram(parse(source), source, options.filename ?? "<input>");
  reattachComments(unit, splitLines(source));
  return { unit, output: renderUnit(unit, { indent: options.indent ?? 4 }) };
}

export function splitLines(source : string) : Array<string> {
  return source.split(/\r?\n/);
}

// Declarations that could not be registered, with the reason. Their source
// ends up as pass-through comments in the entry function.
type Rejections = Map<Stmt, string>;

/**
 * Two passes over the top level: the first registers every class, method
 * and function signature so bodies can call each other in any order, the
 * second translates bodies in source order.
 */
export function translateProgram(stmts : Array<Stmt>, source : string, filename : string) : TranslationUnit {
  const unit = new TranslationUnit(filename);
  const lines = splitLines(source);
  const rejected : Rejections = new Map();

  for (const s of stmts) {
    if (s.tag === "class") declare(s, rejected, () => declareClass(s, unit, rejected));
  }
  for (const s of stmts) {
    if (s.tag === "function") declare(s, rejected, () => declareFunction(s, unit));
  }

  const entry = blockContext(unit, unit.entry, lines);
  stmts.forEach((stmt) => {
    const reason = rejected.get(stmt);
    if (reason !== undefined) return passThrough(stmt, reason, entry);
    switch (stmt.tag) {
      case "function": {
        const fn = unit.freeFunction(stmt.name);
        if (fn === undefined) throw new Error(`function '${stmt.name}' was not registered`);
        return translateBlock(stmt.body, blockContext(unit, fn, lines));
      }
      case "class":
        return translateClassBody(stmt, unit, lines, rejected, entry);
      default:
        return translateStmt(stmt, entry);
    }
  });
  return unit;
}

function blockContext(unit : TranslationUnit, fn : FunctionSymbol, lines : ReadonlyArray<string>) : BlockContext {
  return { unit, scope: new Scope(fn), lines, indent: 1 };
}

function declare(stmt : Stmt, rejected : Rejections, register : () => void) : void {
  try {
    register();
  } catch (err) {
    if (!(err instanceof NotTranslatable)) throw err;
    rejected.set(stmt, err.reason);
  }
}

function isDocstring(stmt : Stmt) : boolean {
  return stmt.tag === "expr" && stmt.expr.tag === "literal" && stmt.expr.value.kind === "str";
}

function declareClass(stmt : StmtOf<"class">, unit : TranslationUnit, rejected : Rejections) : void {
  const bases = stmt.bases.map((b) => {
    if (b.tag !== "id") fail("base classes must be plain names");
    return b.name;
  });
  const cls = new ClassType(stmt.name, bases, stmt.line, stmt.endLine);
  if (!unit.addClass(cls)) fail(`'${stmt.name}' is already defined`);
  for (const member of stmt.body) {
    if (member.tag === "function") {
      declare(member, rejected, () => declareMethod(member, cls, unit));
    } else if (member.tag !== "pass" && !isDocstring(member)) {
      rejected.set(member, "class-level statements are not supported");
    }
  }
}

function declareMethod(stmt : StmtOf<"function">, cls : ClassType, unit : TranslationUnit) : void {
  const [receiver, ...rest] = stmt.params;
  if (receiver === undefined || receiver.kind !== "plain" || receiver.default !== undefined) {
    fail(`method '${stmt.name}' must take the instance as its first parameter`);
  }
  const fn = new FunctionSymbol(stmt.name, stmt.line, stmt.endLine, parameters(rest, `${cls.name}::${stmt.name}`, unit), cls);
  if (!unit.addFunction(fn)) fail(`method '${cls.name}.${stmt.name}' is already defined`);
}

function declareFunction(stmt : StmtOf<"function">, unit : TranslationUnit) : void {
  const fn = new FunctionSymbol(stmt.name, stmt.line, stmt.endLine, parameters(stmt.params, stmt.name, unit));
  if (!unit.addFunction(fn)) fail(`'${stmt.name}' is already defined`);
}

// A literal, or a sign applied to a numeric literal.
function defaultValue(expr : Expr, unit : TranslationUnit) : { code: string, type: TypeSlot } {
  let sign = "";
  let value = expr;
  if (expr.tag === "uni_op" && (expr.op === "-" || expr.op === "+")) {
    sign = expr.op;
    value = expr.arg;
  }
  if (value.tag !== "literal") fail("default values must be literals");
  const literal = value.value;
  if (literal.kind === "None") fail("None default values are not supported");
  if (sign !== "" && literal.kind !== "int" && literal.kind !== "float") fail("default values must be literals");
  const translated = translateLiteral(literal, unit);
  return { code: `${sign === "-" ? "-" : ""}${translated.code}`, type: new TypeSlot(translated.type) };
}

function parameters(params : Array<Param>, owner : string, unit : TranslationUnit) : Array<Parameter> {
  const seen = new Set<string>();
  return params.map((p) => {
    if (p.kind !== "plain") fail(`${p.kind} parameters are not supported`);
    if (seen.has(p.name)) fail(`duplicate parameter '${p.name}'`);
    seen.add(p.name);
    if (p.default === undefined) return new Parameter(p.name, new TypeSlot("auto"), owner);
    const { code, type } = defaultValue(p.default, unit);
    return new Parameter(p.name, type, owner, code);
  });
}

// The constructor goes first so the attributes it creates are known to the
// other methods.
function translateClassBody(
  stmt : StmtOf<"class">, unit : TranslationUnit, lines : ReadonlyArray<string>,
  rejected : Rejections, entry : BlockContext
) : void {
  const cls = unit.classes.get(stmt.name);
  if (cls === undefined) throw new Error(`class '${stmt.name}' was not registered`);
  const methods = stmt.body.filter((m) : m is StmtOf<"function"> => m.tag === "function" && !rejected.has(m));
  const ordered = [
    ...methods.filter((m) => m.name === CONSTRUCTOR),
    ...methods.filter((m) => m.name !== CONSTRUCTOR)
  ];
  ordered.forEach((m) => {
    const fn = cls.methods.get(m.name);
    if (fn === undefined) throw new Error(`method '${stmt.name}.${m.name}' was not registered`);
    translateBlock(m.body, blockContext(unit, fn, lines));
  });
  stmt.body.forEach((member) => {
    const reason = rejected.get(member);
    if (reason !== undefined) passThrough(member, reason, entry);
  });
}
