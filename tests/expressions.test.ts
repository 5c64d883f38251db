import { describe, expect, it } from "vitest";
import { Expr } from "../ast";
import { NotTranslatable } from "../errors";
import { translateExpr, unwrap } from "../expressions";
import { HashSet, Tuple, Variable, Vector } from "../symbols";
import { TypeSlot } from "../types";
import {
  attr, bin, bool, boolOp, compare, float, freeContext, id, index, int, list, methodContext, none, set, str, ternary, tuple, unary, variable
} from "./helpers";

function translate(expr : Expr) {
  const ctx = freeContext();
  variable(ctx.fn, "a", "int");
  variable(ctx.fn, "x", "float");
  variable(ctx.fn, "s", "str");
  variable(ctx.fn, "c", "bool");
  return translateExpr(expr, ctx);
}

function reason(run : () => unknown) : string {
  try {
    run();
  } catch (err) {
    if (err instanceof NotTranslatable) return err.reason;
    throw err;
  }
  throw new Error("expected the expression to be rejected");
}

describe("literals", () => {
  it("quotes and escapes strings", () => {
    const ctx = freeContext();
    const result = translateExpr(str("a\"b\n"), ctx);
    expect(result).toEqual({ code: "\"a\\\"b\\n\"", type: "str" });
    expect([...ctx.unit.dependencies]).toEqual(["string"]);
  });

  it("maps booleans, None and numbers", () => {
    expect(translate(bool(true))).toEqual({ code: "true", type: "bool" });
    expect(translate(none())).toEqual({ code: "nullptr", type: "None" });
    expect(translate(int(10))).toEqual({ code: "10", type: "int" });
    expect(translate(float("2.5"))).toEqual({ code: "2.5", type: "float" });
  });

  it("escapes control characters as octal", () => {
    expect(translate(str("a\x07" + "1")).code).toBe("\"a\\0071\"");
  });

  it("rejects integers outside the 32-bit range", () => {
    expect(translate(int(2147483647)).code).toBe("2147483647");
    expect(reason(() => translate(int(3000000000)))).toBe("integer literal 3000000000 does not fit a C++ int");
  });

  it("rejects complex numbers", () => {
    expect(reason(() => translate(float("1j")))).toBe("complex numbers are not supported");
  });
});

describe("names", () => {
  it("types a name by its declaration", () => {
    expect(translate(id("s"))).toEqual({ code: "s", type: "str" });
  });

  it("rejects undeclared names", () => {
    expect(reason(() => translate(id("zz")))).toBe("'zz' used before declaration");
  });
});

describe("binary operators", () => {
  it("types arithmetic by unification", () => {
    expect(translate(bin(int(1), "+", float("2.5")))).toEqual({ code: "(1 + 2.5)", type: "float" });
    expect(translate(bin(id("s"), "+", id("a")))).toEqual({ code: "(s + a)", type: "str" });
    expect(translate(bin(id("a"), "%", int(2)))).toEqual({ code: "(a % 2)", type: "int" });
  });

  it("casts floor division unless both sides are int", () => {
    expect(translate(bin(int(7), "//", int(2)))).toEqual({ code: "(7 / 2)", type: "int" });
    expect(translate(bin(float("7.5"), "//", int(2)))).toEqual({ code: "(int)(7.5 / 2)", type: "int" });
  });

  it("casts true division unless both sides are float", () => {
    expect(translate(bin(int(7), "/", int(2)))).toEqual({ code: "((double)(7) / 2)", type: "float" });
    expect(translate(bin(float("1.5"), "/", float("0.5")))).toEqual({ code: "(1.5 / 0.5)", type: "float" });
  });

  it("turns exponentiation into std::pow", () => {
    const ctx = freeContext();
    expect(translateExpr(bin(int(2), "**", int(3)), ctx)).toEqual({ code: "std::pow(2, 3)", type: "float" });
    expect(ctx.unit.dependencies.has("cmath")).toBe(true);
  });

  it("rejects matrix multiplication", () => {
    expect(reason(() => translate(bin(id("a"), "@", id("a"))))).toBe("operator '@' is not supported");
  });

  it("rejects collection operands", () => {
    const ctx = freeContext();
    ctx.fn.addCollection(new Vector("v", "int", 1));
    expect(reason(() => translateExpr(bin(id("v"), "+", int(1)), ctx))).toBe("operator '+' is not supported for vector values");
  });
});

describe("boolean and unary operators", () => {
  it("joins boolean chains", () => {
    expect(translate(boolOp("and", id("c"), bool(false))))
      .toEqual({ code: "(c && false)", type: "bool" });
    expect(translate(boolOp("or", id("a"), id("c"))))
      .toEqual({ code: "(a || c)", type: "auto" });
  });

  it("negates with !", () => {
    expect(translate(unary("not", id("c")))).toEqual({ code: "!c", type: "bool" });
  });

  it("keeps nested signs apart", () => {
    expect(translate(unary("-", unary("-", int(1))))).toEqual({ code: "-(-1)", type: "int" });
  });
});

describe("comparisons", () => {
  it("expands chains into conjunctions", () => {
    expect(translate(compare(int(1), ["<", "<="], [id("a"), int(3)]))).toEqual({ code: "(1 < a && a <= 3)", type: "bool" });
  });

  it("rejects membership tests", () => {
    expect(reason(() => translate(compare(id("a"), ["in"], [id("s")])))).toBe("'in' comparisons are not supported");
  });
});

describe("collection literals", () => {
  it("builds homogeneous lists and sets", () => {
    const result = translate(list(int(1), int(2)));
    expect(result.code).toBe("{1, 2}");
    expect(result.type).toBe("vector");
    expect(result.items?.length).toBe(2);
    expect(translate(set(str("a"))).type).toBe("set");
  });

  it("rejects mixed element types", () => {
    expect(reason(() => translate(list(int(1), float("2.5"))))).toBe("heterogeneous collection not supported");
  });

  it("rejects empty lists", () => {
    expect(reason(() => translate(list()))).toBe("cannot infer the element type of an empty list");
  });

  it("keeps per-slot types of tuples", () => {
    const ctx = freeContext();
    const result = translateExpr(tuple(int(1), str("a")), ctx);
    expect(result.code).toBe("std::make_tuple(1, \"a\")");
    expect(result.items?.map((i) => i.type)).toEqual(["int", "str"]);
    expect([...ctx.unit.dependencies]).toEqual(["string", "tuple"]);
  });
});

describe("conditional expressions", () => {
  it("widens int and float branches to float", () => {
    expect(translate(ternary(id("c"), int(1), float("2.5"))))
      .toEqual({ code: "(c ? 1 : 2.5)", type: "float" });
  });

  it("rejects unrelated branch types", () => {
    expect(reason(() => translate(ternary(id("c"), int(1), str("no")))))
      .toBe("conditional branches have different types (int and str)");
  });
});

describe("attributes", () => {
  it("maps self attributes to this->", () => {
    const ctx = methodContext();
    ctx.cls.attributes.set("x", new Variable("x", 3, new TypeSlot("int"), "Point"));
    expect(translateExpr(attr(id("self"), "x"), ctx)).toEqual({ code: "this->x", type: "int" });
  });

  it("rejects other receivers", () => {
    expect(reason(() => translate(attr(id("a"), "real")))).toBe("attribute access is only supported on self");
  });
});

describe("subscripts", () => {
  function withCollections() {
    const ctx = freeContext();
    ctx.fn.addCollection(new Vector("v", "int", 1));
    ctx.fn.addCollection(new Tuple("t", ["int", "float"], 1));
    ctx.fn.addCollection(new HashSet("h", "str", 1));
    variable(ctx.fn, "s", "str");
    variable(ctx.fn, "i", "int");
    return ctx;
  }

  it("indexes vectors with their element type", () => {
    expect(translateExpr(index(id("v"), id("i")), withCollections())).toEqual({ code: "v[i]", type: "int" });
  });

  it("uses std::get for tuples", () => {
    expect(translateExpr(index(id("t"), int(1)), withCollections())).toEqual({ code: "std::get<1>(t)", type: "float" });
    expect(reason(() => translateExpr(index(id("t"), int(2)), withCollections()))).toBe("tuple index 2 out of range");
  });

  it("returns one-character strings", () => {
    expect(translateExpr(index(id("s"), int(0)), withCollections())).toEqual({ code: "std::string(1, s[0])", type: "str" });
  });

  it("rejects negative indices, slices and sets", () => {
    expect(reason(() => translateExpr(index(id("v"), unary("-", int(1))), withCollections()))).toBe("negative indices are not supported");
    const sliced : Expr = { line: 1, endLine: 1, endCol: 0, tag: "index", value: id("v"), index: int(0), slice: true };
    expect(reason(() => translateExpr(sliced, withCollections()))).toBe("slicing is not supported");
    expect(reason(() => translateExpr(index(id("h"), int(0)), withCollections()))).toBe("set 'h' is not subscriptable");
  });
});

describe("unwrap", () => {
  it("drops only a pair that wraps everything", () => {
    expect(unwrap("(a + b)")).toBe("a + b");
    expect(unwrap("(int)(a / b)")).toBe("(int)(a / b)");
    expect(unwrap("((double)(a) / b)")).toBe("(double)(a) / b");
  });
});
