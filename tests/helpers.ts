import { Expr, Pos, Stmt } from "../ast";
import { Context } from "../expressions";
import { Scope } from "../scope";
import { BlockContext } from "../statements";
import { ClassType, FunctionSymbol, Parameter, TranslationUnit, Variable } from "../symbols";
import { TypeSlot, TypeTag } from "../types";

const HERE : Pos = { line: 1, endLine: 1, endCol: 0 };

export const int = (value : number) : Expr => ({ ...HERE, tag: "literal", value: { kind: "int", value, raw: String(value) } });
export const float = (raw : string) : Expr => ({ ...HERE, tag: "literal", value: { kind: "float", value: Number(raw), raw } });
export const str = (value : string) : Expr => ({ ...HERE, tag: "literal", value: { kind: "str", value, raw: JSON.stringify(value) } });
export const bool = (value : boolean) : Expr => ({ ...HERE, tag: "literal", value: { kind: "bool", value, raw: value ? "True" : "False" } });
export const none = () : Expr => ({ ...HERE, tag: "literal", value: { kind: "None", value: null, raw: "None" } });
export const id = (name : string) : Expr => ({ ...HERE, tag: "id", name });
export const bin = (left : Expr, op : string, right : Expr) : Expr => ({ ...HERE, tag: "bin_op", op, left, right });
export const unary = (op : string, arg : Expr) : Expr => ({ ...HERE, tag: "uni_op", op, arg });
export const compare = (left : Expr, ops : Array<string>, comparators : Array<Expr>) : Expr =>
  ({ ...HERE, tag: "compare", left, ops, comparators });
export const attr = (value : Expr, name : string) : Expr => ({ ...HERE, tag: "attribute", value, attr: name });
export const index = (value : Expr, i : Expr) : Expr => ({ ...HERE, tag: "index", value, index: i, slice: false });
export const list = (...elts : Array<Expr>) : Expr => ({ ...HERE, tag: "list", elts });
export const tuple = (...elts : Array<Expr>) : Expr => ({ ...HERE, tag: "tuple", elts });
export const set = (...elts : Array<Expr>) : Expr => ({ ...HERE, tag: "set", elts });
export const boolOp = (op : "and" | "or", ...values : Array<Expr>) : Expr => ({ ...HERE, tag: "bool_op", op, values });
export const ternary = (test : Expr, body : Expr, orelse : Expr) : Expr => ({ ...HERE, tag: "ternary", test, body, orelse });
export const call = (func : Expr | string, ...args : Array<Expr>) : Expr =>
  ({ ...HERE, tag: "call", func: typeof func === "string" ? id(func) : func, args, keywords: false });

// Statements at the given line; endCol is only read by comment reattachment.
export const assign = (line : number, target : Expr | string, value : Expr) : Stmt =>
  ({ line, endLine: line, endCol: 0, tag: "assign", targets: [typeof target === "string" ? id(target) : target], value });
export const exprStmt = (line : number, expr : Expr) : Stmt => ({ line, endLine: line, endCol: 0, tag: "expr", expr });
export const ret = (line : number, value? : Expr) : Stmt => ({ line, endLine: line, endCol: 0, tag: "return", value });

export function variable(fn : FunctionSymbol, name : string, type : TypeTag) : void {
  fn.variables.set(name, new Variable(name, 0, new TypeSlot(type), fn.qualifiedName));
}

export function param(name : string, type : TypeTag = "auto", defaultValue? : string) : Parameter {
  return new Parameter(name, new TypeSlot(type), "f", defaultValue);
}

// A free function "f" spanning lines 1-20.
export function freeContext(params : Array<Parameter> = []) : Context & { fn: FunctionSymbol } {
  const unit = new TranslationUnit("test.py");
  const fn = new FunctionSymbol("f", 1, 20, params);
  unit.addFunction(fn);
  return { unit, scope: new Scope(fn), fn };
}

// Method "m" of class "Point".
export function methodContext(name = "m", params : Array<Parameter> = []) : Context & { fn: FunctionSymbol, cls: ClassType } {
  const unit = new TranslationUnit("test.py");
  const cls = new ClassType("Point", [], 1, 20);
  unit.addClass(cls);
  const fn = new FunctionSymbol(name, 2, 20, params, cls);
  unit.addFunction(fn);
  return { unit, scope: new Scope(fn), fn, cls };
}

export function blockContext(ctx : Context, lines : Array<string> = []) : BlockContext {
  return { ...ctx, lines, indent: 1 };
}

export function codes(fn : FunctionSymbol) : Array<string> {
  return fn.orderedFragments().map((f) => f.code);
}
