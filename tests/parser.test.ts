import { describe, expect, it } from "vitest";
import { parse } from "../parser";

describe("parse", () => {
  it("respects operator precedence", () => {
    const [stmt] = parse("x = 1 + 2 * 3");
    expect(stmt).toMatchObject({
      tag: "assign",
      targets: [{ tag: "id", name: "x" }],
      value: { tag: "bin_op", op: "+", left: { tag: "literal" }, right: { tag: "bin_op", op: "*" } }
    });
  });

  it("flattens chained comparisons and boolean operators", () => {
    const [cmp, bools] = parse("a < b < c\na and b and c");
    expect(cmp).toMatchObject({ tag: "expr", expr: { tag: "compare", left: { name: "a" }, ops: ["<", "<"] } });
    expect(bools.tag === "expr" && bools.expr.tag === "bool_op" ? bools.expr.values.length : 0).toBe(3);
  });

  it("reads unary operators and update statements", () => {
    const [neg, update] = parse("-5\nx += 1");
    expect(neg).toMatchObject({ tag: "expr", expr: { tag: "uni_op", op: "-", arg: { tag: "literal" } } });
    expect(update).toMatchObject({ tag: "aug_assign", op: "+", target: { name: "x" } });
  });

  it("records line numbers", () => {
    const stmts = parse("x = 1\n\ny = 2\n");
    expect(stmts.map((s) => [s.line, s.endLine])).toEqual([[1, 1], [3, 3]]);
  });

  it("decodes string escapes", () => {
    const [stmt] = parse("s = \"a\\tb\"");
    expect(stmt).toMatchObject({ tag: "assign", value: { tag: "literal", value: { kind: "str", value: "a\tb" } } });
  });

  it("decodes hex, unicode and octal escapes", () => {
    const [stmt] = parse("s = \"\\x41\\u00e9\\101\"");
    expect(stmt).toMatchObject({ tag: "assign", value: { tag: "literal", value: { kind: "str", value: "A\u00e9A" } } });
  });

  it("refuses named unicode escapes", () => {
    const [stmt] = parse("s = \"\\N{BULLET}\"");
    expect(stmt).toMatchObject({ tag: "assign", value: { tag: "unsupported", kind: "named unicode escape" } });
  });

  it("marks f-strings and unknown statements as unsupported", () => {
    const [fstring, tryStmt] = parse("x = f\"{y}\"\ntry:\n    pass\nexcept:\n    pass\n");
    expect(fstring).toMatchObject({ tag: "assign", value: { tag: "unsupported", kind: "f-string" } });
    expect(tryStmt).toMatchObject({ tag: "unsupported", kind: "try", line: 2, endLine: 5 });
  });

  it("reads parameters with defaults", () => {
    const [fn] = parse("def f(a, b=2):\n    return a\n");
    expect(fn).toMatchObject({
      tag: "function",
      name: "f",
      params: [{ name: "a", kind: "plain" }, { name: "b", kind: "plain", default: { tag: "literal" } }],
      line: 1,
      endLine: 2
    });
  });
});
