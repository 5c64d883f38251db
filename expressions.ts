import { Expr, ExprOf, Literal } from "./ast";
import { translateCall } from "./calls";
import { fail, SymbolNotFound } from "./errors";
import { Resolved, Scope, typeOf } from "./scope";
import { TranslationUnit } from "./symbols";
import { isCollection, isPrimitive, TypeTag, unify } from "./types";

export type Context = { unit: TranslationUnit, scope: Scope };

// items holds the translated elements of a collection literal.
export type Translated = { code: string, type: TypeTag, items?: Array<Translated> };

const BINARY_OPS: Record<string, string> = {
  "+": "+", "-": "-", "*": "*", "%": "%",
  "<<": "<<", ">>": ">>", "|": "|", "&": "&", "^": "^",
};

const COMPARISON_OPS: Record<string, string> = {
  "==": "==", "!=": "!=", "<": "<", "<=": "<=", ">": ">", ">=": ">=",
};

export function resolve(scope : Scope, name : string) : Resolved {
  try {
    return scope.lookup(name);
  } catch (err) {
    if (err instanceof SymbolNotFound) fail(`'${name}' used before declaration`);
    throw err;
  }
}

const INT_MIN = -2147483648;
const INT_MAX = 2147483647;

// Other control characters become three-digit octal escapes.
export function quote(value : string) : string {
  const escaped = value
    .replace(/\\/g, "\\\\")
    .replace(/"/g, "\\\"")
    .replace(/\n/g, "\\n")
    .replace(/\r/g, "\\r")
    .replace(/\t/g, "\\t")
    .replace(/[\x00-\x08\x0b\x0c\x0e-\x1f\x7f]/g, (ch) => `\\${ch.charCodeAt(0).toString(8).padStart(3, "0")}`);
  return `"${escaped}"`;
}

// Drops one pair of parentheses wrapping the whole fragment.
export function unwrap(code : string) : string {
  if (!code.startsWith("(") || !code.endsWith(")")) return code;
  let depth = 0;
  for (let i = 0; i < code.length; i++) {
    if (code[i] === "(") depth++;
    else if (code[i] === ")") depth--;
    if (depth === 0 && i < code.length - 1) return code;
  }
  return code.slice(1, -1);
}

export function translateLiteral(literal : Literal, unit : TranslationUnit) : Translated {
  switch (literal.kind) {
    case "str":
      unit.require("string");
      return { code: quote(literal.value), type: "str" };
    case "bool":
      return { code: literal.value ? "true" : "false", type: "bool" };
    case "None":
      return { code: "nullptr", type: "None" };
    case "int":
      if (!Number.isInteger(literal.value) || literal.value < INT_MIN || literal.value > INT_MAX) {
        fail(`integer literal ${literal.raw} does not fit a C++ int`);
      }
      return { code: String(literal.value), type: "int" };
    case "float":
      if (Number.isNaN(literal.value)) fail("complex numbers are not supported");
      return { code: literal.raw, type: "float" };
  }
}

export function translateExpr(expr : Expr, ctx : Context) : Translated {
  switch (expr.tag) {
    case "literal":
      return translateLiteral(expr.value, ctx.unit);
    case "id":
      return { code: expr.name, type: typeOf(resolve(ctx.scope, expr.name)) };
    case "bin_op":
      return translateBinary(expr, ctx);
    case "bool_op": {
      if (expr.values.length < 2) fail(`'${expr.op}' needs at least two operands`);
      const values = expr.values.map((v) => translateExpr(v, ctx));
      const type = values.every((v) => v.type === values[0].type) ? values[0].type : "auto";
      return { code: `(${values.map((v) => v.code).join(expr.op === "and" ? " && " : " || ")})`, type };
    }
    case "uni_op": {
      const arg = translateExpr(expr.arg, ctx);
      if (expr.op === "not") return { code: `!${arg.code}`, type: "bool" };
      if (expr.op !== "-" && expr.op !== "+" && expr.op !== "~") fail(`unary operator '${expr.op}' is not supported`);
      // "- -x" must not become a decrement
      const inner = /^[-+~]/.test(arg.code) ? `(${arg.code})` : arg.code;
      return { code: `${expr.op}${inner}`, type: "int" };
    }
    case "compare":
      return translateCompare(expr, ctx);
    case "call":
      return translateCall(expr, ctx);
    case "attribute":
      return translateAttribute(expr, ctx);
    case "index":
      return translateIndex(expr, ctx);
    case "list":
    case "set":
      return translateCollection(expr, ctx);
    case "tuple": {
      if (expr.elts.length === 0) fail("empty tuples are not supported");
      const items = expr.elts.map((e) => translateExpr(e, ctx));
      items.forEach((item) => {
        if (!isPrimitive(item.type)) fail("tuple elements must be plain values");
      });
      ctx.unit.require("tuple");
      return { code: `std::make_tuple(${items.map((i) => i.code).join(", ")})`, type: "tuple", items };
    }
    case "ternary": {
      const test = translateExpr(expr.test, ctx);
      const body = translateExpr(expr.body, ctx);
      const orelse = translateExpr(expr.orelse, ctx);
      let type : TypeTag;
      if (body.type === orelse.type && !isCollection(body.type)) type = body.type;
      else if (unify(body.type, orelse.type) === "float" && body.type !== "str" && orelse.type !== "str") type = "float";
      else fail(`conditional branches have different types (${body.type} and ${orelse.type})`);
      return { code: `(${unwrap(test.code)} ? ${body.code} : ${orelse.code})`, type };
    }
    case "unsupported":
      return fail(`${expr.kind} is not supported`);
  }
}

function operand(value : Translated, op : string) : Translated {
  if (isCollection(value.type) || value.type === "void" || value.type === "None" || value.type === "constructor") {
    fail(`operator '${op}' is not supported for ${value.type} values`);
  }
  return value;
}

function translateBinary(expr : ExprOf<"bin_op">, ctx : Context) : Translated {
  const left = operand(translateExpr(expr.left, ctx), expr.op);
  const right = operand(translateExpr(expr.right, ctx), expr.op);
  switch (expr.op) {
    case "**":
      ctx.unit.require("cmath");
      return { code: `std::pow(${left.code}, ${right.code})`, type: "float" };
    case "//":
      if (left.type === "int" && right.type === "int") return { code: `(${left.code} / ${right.code})`, type: "int" };
      return { code: `(int)(${left.code} / ${right.code})`, type: "int" };
    case "/":
      if (left.type === "float" && right.type === "float") return { code: `(${left.code} / ${right.code})`, type: "float" };
      return { code: `((double)(${left.code}) / ${right.code})`, type: "float" };
    default: {
      const op = BINARY_OPS[expr.op];
      if (op === undefined) fail(`operator '${expr.op}' is not supported`);
      return { code: `(${left.code} ${op} ${right.code})`, type: unify(left.type, right.type) };
    }
  }
}

function translateCompare(expr : ExprOf<"compare">, ctx : Context) : Translated {
  expr.ops.forEach((op) => {
    if (COMPARISON_OPS[op] === undefined) fail(`'${op}' comparisons are not supported`);
  });
  const operands = [translateExpr(expr.left, ctx), ...expr.comparators.map((c) => translateExpr(c, ctx))];
  const pairs = expr.ops.map((op, i) => `${operands[i].code} ${COMPARISON_OPS[op]} ${operands[i + 1].code}`);
  return { code: `(${pairs.join(" && ")})`, type: "bool" };
}

function translateCollection(expr : ExprOf<"list"> | ExprOf<"set">, ctx : Context) : Translated {
  const kind = expr.tag === "list" ? "list" : "set";
  if (expr.elts.length === 0) fail(`cannot infer the element type of an empty ${kind}`);
  const items = expr.elts.map((e) => translateExpr(e, ctx));
  if (!isPrimitive(items[0].type)) fail(`${kind} elements must be plain values`);
  if (items.some((item) => item.type !== items[0].type)) fail("heterogeneous collection not supported");
  return { code: `{${items.map((i) => i.code).join(", ")}}`, type: expr.tag === "list" ? "vector" : "set", items };
}

export function isSelf(expr : Expr, scope : Scope) : boolean {
  return expr.tag === "id" && expr.name === "self" && scope.cls !== undefined;
}

function translateAttribute(expr : ExprOf<"attribute">, ctx : Context) : Translated {
  if (!isSelf(expr.value, ctx.scope)) fail("attribute access is only supported on self");
  const member = ctx.scope.member(expr.attr);
  if (member === undefined) fail(`'self.${expr.attr}' used before declaration`);
  return { code: `this->${expr.attr}`, type: typeOf(member) };
}

function isNegativeLiteral(expr : Expr) : boolean {
  return expr.tag === "uni_op" && expr.op === "-" && expr.arg.tag === "literal";
}

function indexBase(expr : Expr, ctx : Context) : { code: string, resolved: Resolved } {
  if (expr.tag === "attribute" && isSelf(expr.value, ctx.scope)) {
    const member = ctx.scope.member(expr.attr);
    if (member === undefined) fail(`'self.${expr.attr}' used before declaration`);
    return { code: `this->${expr.attr}`, resolved: member };
  }
  if (expr.tag !== "id") fail("only named values can be indexed");
  try {
    return { code: expr.name, resolved: ctx.scope.indexable(expr.name) };
  } catch (err) {
    if (err instanceof SymbolNotFound) fail(`'${expr.name}' used before declaration`);
    throw err;
  }
}

function translateIndex(expr : ExprOf<"index">, ctx : Context) : Translated {
  if (expr.slice) fail("slicing is not supported");
  const { code, resolved } = indexBase(expr.value, ctx);
  if (resolved.kind === "collection") {
    const collection = resolved.collection;
    switch (collection.kind) {
      case "tuple": {
        const index = expr.index;
        if (index.tag !== "literal" || index.value.kind !== "int") fail("tuple index must be an integer literal");
        if (index.value.value >= collection.arity) fail(`tuple index ${index.value.value} out of range`);
        return { code: `std::get<${index.value.value}>(${code})`, type: collection.elementTypes[index.value.value] };
      }
      case "vector": {
        if (isNegativeLiteral(expr.index)) fail("negative indices are not supported");
        const index = translateExpr(expr.index, ctx);
        if (index.type !== "int" && index.type !== "auto") fail(`vector index must be an int, not ${index.type}`);
        return { code: `${code}[${unwrap(index.code)}]`, type: collection.elementType };
      }
      case "set":
        return fail(`set '${collection.name}' is not subscriptable`);
    }
  }
  const type = resolved.variable.type.tag;
  if (isNegativeLiteral(expr.index)) fail("negative indices are not supported");
  const index = translateExpr(expr.index, ctx);
  if (index.type !== "int" && index.type !== "auto") fail(`string index must be an int, not ${index.type}`);
  if (type === "str") {
    ctx.unit.require("string");
    return { code: `std::string(1, ${code}[${unwrap(index.code)}])`, type: "str" };
  }
  if (type === "auto") return { code: `${code}[${unwrap(index.code)}]`, type: "auto" };
  return fail(`'${code}' of type ${type} is not subscriptable`);
}
