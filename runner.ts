import { promises as fs } from "fs";
import path from "path";
import { compile } from "./compiler";
import { SnakecastConfig } from "./config";
import { Diagnostic } from "./symbols";

export type TranslateResult = {
  outPath: string,
  diagnostics: Array<Diagnostic>
};

export function outputPath(scriptPath : string, outDir : string) : string {
  return path.join(outDir, `${path.basename(scriptPath, path.extname(scriptPath))}.cpp`);
}

// Reads one script, translates it and writes <outDir>/<name>.cpp.
export async function translateFile(scriptPath : string, config : SnakecastConfig) : Promise<TranslateResult> {
  const source = await fs.readFile(scriptPath, "utf8");
  const { unit, output } = compile(source, { filename: path.basename(scriptPath), indent: config.indent });
  const outPath = outputPath(scriptPath, config.outDir);
  await fs.mkdir(config.outDir, { recursive: true });
  await fs.writeFile(outPath, output, "utf8");
  return { outPath, diagnostics: unit.diagnostics };
}
