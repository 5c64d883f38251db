import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, describe, expect, it } from "vitest";
import { outputPath, translateFile } from "../runner";

describe("outputPath", () => {
  it("swaps the extension and directory", () => {
    expect(outputPath(path.join("scripts", "demo.py"), "out")).toBe(path.join("out", "demo.cpp"));
  });
});

describe("translateFile", () => {
  let dir = "";

  afterEach(() => {
    if (dir !== "") fs.rmSync(dir, { recursive: true, force: true });
  });

  it("writes the translation next to the configured output directory", async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "snakecast-"));
    const script = path.join(dir, "demo.py");
    fs.writeFileSync(script, "x = 1\nx = \"a\"\n");
    const outDir = path.join(dir, "out");

    const result = await translateFile(script, { outDir, indent: 2, verbose: false });

    expect(result.outPath).toBe(path.join(outDir, "demo.cpp"));
    expect(result.diagnostics.map((d) => d.reason)).toEqual(["cannot assign a str value to 'x' of type int"]);
    expect(fs.readFileSync(result.outPath, "utf8")).toBe([
      "#include <string>",
      "",
      "int main(int argc, char **argv) {",
      "  int x = 1;",
      "  // [cannot assign a str value to 'x' of type int] x = \"a\"",
      "  return 0;",
      "}",
      ""
    ].join("\n"));
  });
});
