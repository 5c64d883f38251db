import { fail } from "./errors";
import { Translated } from "./expressions";
import { TranslationUnit } from "./symbols";
import { isPrimitive, TypeTag } from "./types";

// Built-ins with a fixed C++ expansion.
export type PortedFunction = (args : Array<Translated>, unit : TranslationUnit) => Translated;

function isNumeric(type : TypeTag) : boolean {
  return type === "int" || type === "float" || type === "bool" || type === "auto";
}

function expectArity(name : string, args : Array<Translated>, min : number, max = min) : void {
  if (args.length < min || args.length > max) {
    const expected = min === max ? `${min}` : `${min} to ${max}`;
    fail(`${name}() takes ${expected} argument(s) but ${args.length} were given`);
  }
}

function expectNumeric(name : string, args : Array<Translated>) : void {
  args.forEach((arg) => {
    if (!isNumeric(arg.type)) fail(`${name}() expects a number, not ${arg.type}`);
  });
}

function print(args : Array<Translated>, unit : TranslationUnit) : Translated {
  args.forEach((arg) => {
    if (!isPrimitive(arg.type) && arg.type !== "auto") fail(`cannot print a ${arg.type} value`);
  });
  unit.require("iostream");
  const parts = args.map((a) => a.code).join(" << \" \" << ");
  return { code: args.length === 0 ? "std::cout << std::endl" : `std::cout << ${parts} << std::endl`, type: "void" };
}

function sqrt(args : Array<Translated>, unit : TranslationUnit) : Translated {
  expectArity("sqrt", args, 1);
  expectNumeric("sqrt", args);
  unit.require("cmath");
  return { code: `std::sqrt(${args[0].code})`, type: "float" };
}

function pow(args : Array<Translated>, unit : TranslationUnit) : Translated {
  expectArity("pow", args, 2);
  expectNumeric("pow", args);
  unit.require("cmath");
  return { code: `std::pow(${args[0].code}, ${args[1].code})`, type: "float" };
}

// log(x), log(x, 10) and log(x, base)
function log(args : Array<Translated>, unit : TranslationUnit) : Translated {
  expectArity("log", args, 1, 2);
  expectNumeric("log", args);
  unit.require("cmath");
  const [x, base] = args;
  if (base === undefined) return { code: `std::log(${x.code})`, type: "float" };
  if (base.code === "10") return { code: `std::log10(${x.code})`, type: "float" };
  return { code: `(std::log(${x.code}) / std::log(${base.code}))`, type: "float" };
}

function len(args : Array<Translated>, unit : TranslationUnit) : Translated {
  expectArity("len", args, 1);
  const [obj] = args;
  switch (obj.type) {
    case "str": {
      unit.require("string");
      // A literal is a const char* until wrapped.
      const text = obj.code.startsWith("\"") ? `std::string(${obj.code})` : obj.code;
      return { code: `${text}.length()`, type: "int" };
    }
    case "tuple":
      return { code: `std::tuple_size<decltype(${obj.code})>::value`, type: "int" };
    case "vector":
    case "set":
    case "auto":
      return { code: `${obj.code}.size()`, type: "int" };
    default:
      return fail(`object of type ${obj.type} has no len()`);
  }
}

export const PORTED_FUNCTIONS = new Map<string, PortedFunction>([
  ["print", print],
  ["sqrt", sqrt],
  ["pow", pow],
  ["log", log],
  ["len", len],
]);
