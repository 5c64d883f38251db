import { Expr, ExprOf } from "./ast";
import { fail } from "./errors";
import { Context, isSelf, Translated, translateExpr } from "./expressions";
import { PORTED_FUNCTIONS } from "./ported";
import { Collection, FunctionSymbol } from "./symbols";
import { isPrimitive, Primitive } from "./types";

type CollectionMethod = { kinds: Array<Collection["kind"]>, arity: 0 | 1, spelling: string };

const COLLECTION_METHODS = new Map<string, CollectionMethod>([
  ["append", { kinds: ["vector"], arity: 1, spelling: "push_back" }],
  ["add", { kinds: ["set"], arity: 1, spelling: "insert" }],
  ["remove", { kinds: ["set"], arity: 1, spelling: "erase" }],
  ["discard", { kinds: ["set"], arity: 1, spelling: "erase" }],
  ["clear", { kinds: ["vector", "set"], arity: 0, spelling: "clear" }],
]);

const CASTS = new Map<string, Primitive>([
  ["str", "str"],
  ["int", "int"],
  ["float", "float"],
  ["bool", "bool"],
]);

export function translateCall(expr : ExprOf<"call">, ctx : Context) : Translated {
  if (expr.keywords) fail("keyword and starred arguments are not supported");
  const callee = expr.func;
  if (callee.tag === "attribute") return translateMethodCall(callee, expr.args, ctx);
  if (callee.tag !== "id") fail("only calls to named functions are supported");
  const cast = CASTS.get(callee.name);
  if (cast !== undefined) return translateCast(callee.name, cast, expr.args, ctx);
  return translatePlainCall(callee.name, expr.args, ctx);
}

function receiverCollection(receiver : Expr, ctx : Context) : { code: string, collection: Collection } | undefined {
  if (receiver.tag === "attribute" && isSelf(receiver.value, ctx.scope)) {
    const member = ctx.scope.member(receiver.attr);
    return member?.kind === "collection" ? { code: `this->${receiver.attr}`, collection: member.collection } : undefined;
  }
  if (receiver.tag !== "id") return undefined;
  const local = (ctx.scope.cls === undefined ? undefined : ctx.scope.member(receiver.name)) ?? ctx.scope.local(receiver.name);
  return local?.kind === "collection" ? { code: receiver.name, collection: local.collection } : undefined;
}

function describe(receiver : Expr, method : string) : string {
  if (receiver.tag === "id") return `${receiver.name}.${method}`;
  if (receiver.tag === "attribute" && receiver.value.tag === "id") return `${receiver.value.name}.${receiver.attr}.${method}`;
  return method;
}

function translateMethodCall(callee : ExprOf<"attribute">, args : Array<Expr>, ctx : Context) : Translated {
  const method = callee.attr;
  if (isSelf(callee.value, ctx.scope)) {
    const target = ctx.scope.cls?.methods.get(method);
    if (target === undefined || target.isConstructor) fail(`'self.${method}' is not a method of this class`);
    const call = translateUserCall(target, args, ctx);
    return { code: `this->${call.code}`, type: call.type };
  }
  const receiver = receiverCollection(callee.value, ctx);
  if (receiver === undefined) fail(`call to '${describe(callee.value, method)}' is not supported`);
  const { code, collection } = receiver;
  const spec = COLLECTION_METHODS.get(method);
  if (spec === undefined || !spec.kinds.includes(collection.kind)) {
    fail(`'${method}' is not supported on ${collection.kind} '${collection.name}'`);
  }
  if (args.length !== spec.arity) fail(`${method}() takes exactly ${spec.arity} argument(s)`);
  if (spec.arity === 0) return { code: `${code}.${spec.spelling}()`, type: "void" };
  if (collection.kind === "tuple") fail(`'${method}' is not supported on tuple '${collection.name}'`);
  const arg = translateExpr(args[0], ctx);
  if (arg.type !== collection.elementType) {
    fail(`cannot ${method} a ${arg.type} value to ${collection.kind} '${collection.name}' of ${collection.elementType}`);
  }
  return { code: `${code}.${spec.spelling}(${arg.code})`, type: "void" };
}

function translateCast(name : string, target : Primitive, args : Array<Expr>, ctx : Context) : Translated {
  if (args.length !== 1) fail(`${name}() conversion takes exactly 1 argument`);
  const arg = translateExpr(args[0], ctx);
  if (!isPrimitive(arg.type) && arg.type !== "auto") fail(`cannot convert a ${arg.type} value to ${name}`);
  const fromString = arg.type === "str";
  switch (target) {
    case "str":
      ctx.unit.require("string");
      if (fromString) return arg;
      return { code: `std::to_string(${arg.code})`, type: "str" };
    case "int":
      return { code: fromString ? `std::stoi(${arg.code})` : `(int)(${arg.code})`, type: "int" };
    case "float":
      return { code: fromString ? `std::stod(${arg.code})` : `(double)(${arg.code})`, type: "float" };
    case "bool":
      return { code: fromString ? `(!${arg.code}.empty())` : `(bool)(${arg.code})`, type: "bool" };
  }
}

// Each argument's type is unified into the parameter it binds to, so the
// callee's signature sharpens with every call site.
function translateUserCall(fn : FunctionSymbol, args : Array<Expr>, ctx : Context) : Translated {
  const params = [...fn.params.values()];
  const required = params.filter((p) => p.defaultValue === undefined).length;
  if (args.length < required || args.length > params.length) {
    fail(`${fn.name}() takes ${required === params.length ? required : `${required} to ${params.length}`} argument(s) but ${args.length} were given`);
  }
  const translated = args.map((a) => translateExpr(a, ctx));
  translated.forEach((arg, i) => {
    params[i].type.unify(arg.type);
  });
  return { code: `${fn.name}(${translated.map((a) => a.code).join(", ")})`, type: fn.returnType.tag };
}

function translatePlainCall(name : string, args : Array<Expr>, ctx : Context) : Translated {
  const fn = ctx.unit.freeFunction(name);
  if (fn !== undefined) return translateUserCall(fn, args, ctx);
  if (ctx.unit.classes.has(name)) fail(`constructing '${name}' instances is not supported`);
  const ported = PORTED_FUNCTIONS.get(name);
  if (ported === undefined) fail(`'${name}' is not in scope`);
  return ported(args.map((a) => translateExpr(a, ctx)), ctx.unit);
}
