import { describe, expect, it } from "vitest";
import { Expr } from "../ast";
import { NotTranslatable } from "../errors";
import { Context, translateExpr } from "../expressions";
import { ClassType, FunctionSymbol, HashSet, Tuple, Vector } from "../symbols";
import { attr, call, float, freeContext, id, int, methodContext, param, str, variable } from "./helpers";

function reason(run : () => unknown) : string {
  try {
    run();
  } catch (err) {
    if (err instanceof NotTranslatable) return err.reason;
    throw err;
  }
  throw new Error("expected the call to be rejected");
}

function context() {
  const ctx = freeContext();
  variable(ctx.fn, "n", "int");
  variable(ctx.fn, "x", "float");
  variable(ctx.fn, "s", "str");
  ctx.fn.addCollection(new Vector("b", "int", 1));
  ctx.fn.addCollection(new HashSet("h", "str", 1));
  ctx.fn.addCollection(new Tuple("t", ["int", "str"], 1));
  return ctx;
}

function translate(expr : Expr, ctx : Context = context()) {
  return translateExpr(expr, ctx);
}

describe("built-in functions", () => {
  it("prints values separated by spaces", () => {
    const ctx = context();
    expect(translate(call("print", int(1), str("a")), ctx))
      .toEqual({ code: "std::cout << 1 << \" \" << \"a\" << std::endl", type: "void" });
    expect([...ctx.unit.dependencies]).toEqual(["string", "iostream"]);
  });

  it("prints an empty line without arguments", () => {
    expect(translate(call("print")).code).toBe("std::cout << std::endl");
  });

  it("refuses to print collections", () => {
    expect(reason(() => translate(call("print", id("b"))))).toBe("cannot print a vector value");
  });

  it("maps math functions to cmath", () => {
    expect(translate(call("sqrt", id("n")))).toEqual({ code: "std::sqrt(n)", type: "float" });
    expect(translate(call("pow", int(2), id("x")))).toEqual({ code: "std::pow(2, x)", type: "float" });
    expect(reason(() => translate(call("sqrt", id("s"))))).toBe("sqrt() expects a number, not str");
    expect(reason(() => translate(call("pow", int(2))))).toBe("pow() takes 2 argument(s) but 1 were given");
  });

  it("picks the logarithm by base", () => {
    expect(translate(call("log", id("x"))).code).toBe("std::log(x)");
    expect(translate(call("log", id("x"), int(10))).code).toBe("std::log10(x)");
    expect(translate(call("log", id("x"), int(2))).code).toBe("(std::log(x) / std::log(2))");
  });

  it("measures strings, vectors, sets and tuples", () => {
    expect(translate(call("len", id("s")))).toEqual({ code: "s.length()", type: "int" });
    expect(translate(call("len", str("abc"))).code).toBe("std::string(\"abc\").length()");
    expect(translate(call("len", id("b")))).toEqual({ code: "b.size()", type: "int" });
    expect(translate(call("len", id("h")))).toEqual({ code: "h.size()", type: "int" });
    expect(translate(call("len", id("t")))).toEqual({ code: "std::tuple_size<decltype(t)>::value", type: "int" });
    expect(reason(() => translate(call("len", int(5))))).toBe("object of type int has no len()");
  });
});

describe("conversions", () => {
  it("converts to strings", () => {
    expect(translate(call("str", id("n")))).toEqual({ code: "std::to_string(n)", type: "str" });
    expect(translate(call("str", id("s")))).toEqual({ code: "s", type: "str" });
  });

  it("parses strings into numbers", () => {
    expect(translate(call("int", id("s")))).toEqual({ code: "std::stoi(s)", type: "int" });
    expect(translate(call("float", id("s")))).toEqual({ code: "std::stod(s)", type: "float" });
    expect(translate(call("bool", id("s")))).toEqual({ code: "(!s.empty())", type: "bool" });
  });

  it("casts between numbers", () => {
    expect(translate(call("int", id("x")))).toEqual({ code: "(int)(x)", type: "int" });
    expect(translate(call("float", id("n")))).toEqual({ code: "(double)(n)", type: "float" });
    expect(translate(call("bool", id("n")))).toEqual({ code: "(bool)(n)", type: "bool" });
  });

  it("takes exactly one argument", () => {
    expect(reason(() => translate(call("int", int(1), int(2))))).toBe("int() conversion takes exactly 1 argument");
  });
});

describe("user functions", () => {
  function withAdd(params = [param("a"), param("b")]) {
    const ctx = context();
    ctx.unit.addFunction(new FunctionSymbol("add", 30, 32, params));
    return ctx;
  }

  it("refines parameter types from the arguments", () => {
    const ctx = withAdd();
    expect(translate(call("add", int(1), float("2.5")), ctx)).toEqual({ code: "add(1, 2.5)", type: "void" });
    const add = ctx.unit.freeFunction("add");
    expect([...(add?.params.values() ?? [])].map((p) => p.type.tag)).toEqual(["int", "float"]);
  });

  it("widens a parameter across call sites", () => {
    const ctx = withAdd();
    translate(call("add", int(1), int(2)), ctx);
    translate(call("add", float("1.5"), int(2)), ctx);
    expect(ctx.unit.freeFunction("add")?.params.get("a")?.type.tag).toBe("float");
  });

  it("types the call by the current return type", () => {
    const ctx = withAdd();
    ctx.unit.freeFunction("add")?.returnType.unify("int");
    expect(translate(call("add", int(1), int(2)), ctx).type).toBe("int");
  });

  it("checks arity against defaults", () => {
    const ctx = withAdd([param("a"), param("b", "int", "1")]);
    expect(translate(call("add", int(1)), ctx).code).toBe("add(1)");
    expect(reason(() => translate(call("add"), ctx))).toBe("add() takes 1 to 2 argument(s) but 0 were given");
    expect(reason(() => translate(call("add", int(1), int(2), int(3)), ctx)))
      .toBe("add() takes 1 to 2 argument(s) but 3 were given");
  });

  it("shadows built-ins of the same name", () => {
    const ctx = context();
    ctx.unit.addFunction(new FunctionSymbol("len", 30, 31, [param("v")]));
    expect(translate(call("len", id("s")), ctx).code).toBe("len(s)");
  });

  it("refuses unknown callees and constructors", () => {
    const ctx = context();
    ctx.unit.addClass(new ClassType("Shape", [], 40, 42));
    expect(reason(() => translate(call("nowhere", int(1)), ctx))).toBe("'nowhere' is not in scope");
    expect(reason(() => translate(call("Shape"), ctx))).toBe("constructing 'Shape' instances is not supported");
  });

  it("refuses keyword arguments", () => {
    const expr : Expr = { line: 1, endLine: 1, endCol: 0, tag: "call", func: id("print"), args: [], keywords: true };
    expect(reason(() => translate(expr))).toBe("keyword and starred arguments are not supported");
  });
});

describe("collection methods", () => {
  it("appends to vectors", () => {
    expect(translate(call(attr(id("b"), "append"), int(4)))).toEqual({ code: "b.push_back(4)", type: "void" });
  });

  it("requires the exact element type", () => {
    expect(reason(() => translate(call(attr(id("b"), "append"), float("2.5")))))
      .toBe("cannot append a float value to vector 'b' of int");
  });

  it("maps set methods", () => {
    expect(translate(call(attr(id("h"), "add"), str("k"))).code).toBe("h.insert(\"k\")");
    expect(translate(call(attr(id("h"), "discard"), id("s"))).code).toBe("h.erase(s)");
    expect(translate(call(attr(id("h"), "clear"))).code).toBe("h.clear()");
  });

  it("rejects methods the collection does not have", () => {
    expect(reason(() => translate(call(attr(id("b"), "add"), int(1))))).toBe("'add' is not supported on vector 'b'");
    expect(reason(() => translate(call(attr(id("t"), "clear"))))).toBe("'clear' is not supported on tuple 't'");
    expect(reason(() => translate(call(attr(id("b"), "clear"), int(1))))).toBe("clear() takes exactly 0 argument(s)");
  });

  it("rejects calls on other receivers", () => {
    expect(reason(() => translate(call(attr(id("n"), "bit_length"))))).toBe("call to 'n.bit_length' is not supported");
  });
});

describe("calls inside methods", () => {
  it("reaches class collections through self", () => {
    const ctx = methodContext();
    ctx.cls.addCollection(new Vector("items", "str", 3));
    expect(translate(call(attr(attr(id("self"), "items"), "append"), str("x")), ctx).code).toBe("this->items.push_back(\"x\")");
  });

  it("calls sibling methods through this", () => {
    const ctx = methodContext();
    const scale = new FunctionSymbol("scale", 10, 12, [param("k")], ctx.cls);
    ctx.unit.addFunction(scale);
    expect(translate(call(attr(id("self"), "scale"), int(2)), ctx)).toEqual({ code: "this->scale(2)", type: "void" });
    expect(scale.params.get("k")?.type.tag).toBe("int");
  });

  it("rejects unknown methods", () => {
    const ctx = methodContext();
    expect(reason(() => translate(call(attr(id("self"), "missing")), ctx))).toBe("'self.missing' is not a method of this class");
  });
});
