#!/usr/bin/env node
import fs from "fs";
import path from "path";
import { c } from "./colors";
import { loadConfig } from "./config";
import { applyFlags, Flags, parseFlags, UsageError } from "./flags";
import { translateFile } from "./runner";

function readVersion() : string {
  try {
    const pkg : unknown = JSON.parse(fs.readFileSync(path.join(__dirname, "..", "package.json"), "utf8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") return pkg.version;
  } catch (err) {
    console.error(c.gray(`could not read package.json: ${err instanceof Error ? err.message : String(err)}`));
  }
  return "";
}

function printUsage() : void {
  console.log(c.bold("snakecast"));
  console.log(c.gray("Usage:"));
  console.log("  snakecast <file.py...>       → translate each script to <outDir>/<name>.cpp");
  console.log(c.gray("Flags:"));
  console.log("    -o, --out-dir <dir>        → output directory (default: out)");
  console.log("    --indent <n|tab>           → indentation of the generated code (default: 4)");
  console.log("    --verbose                  → list every statement left as a comment");
  console.log("    -v, --version              → print the snakecast version");
  console.log("    -h, --help                 → show this help");
}

async function main() : Promise<void> {
  let flags : Flags;
  try {
    flags = parseFlags(process.argv.slice(2));
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    console.error(c.error(`✖ ${err.message}`));
    printUsage();
    process.exitCode = 1;
    return;
  }
  if (flags.version) {
    const v = readVersion();
    console.log(v ? `snakecast v${v}` : "snakecast");
    return;
  }
  if (flags.help || flags.files.length === 0) {
    printUsage();
    if (!flags.help) process.exitCode = 1;
    return;
  }

  const config = applyFlags(loadConfig(), flags);
  console.log(c.title("⚡ snakecast"));
  for (const file of flags.files) {
    if (!fs.existsSync(file)) {
      console.error(c.error(`✖ ${file}: no such file`));
      process.exitCode = 1;
      continue;
    }
    try {
      const { outPath, diagnostics } = await translateFile(file, config);
      const note = diagnostics.length === 0 ? "" : c.warn(`(${diagnostics.length} statement(s) left as comments)`);
      console.log("  ", c.success("✔"), file, c.gray("→"), outPath, note);
      if (config.verbose) {
        diagnostics.forEach((d) => console.log("    ", c.warn(`${file}:${d.line}`), ` ${d.reason}`));
      }
    } catch (err) {
      console.error(c.error(`✖ ${file}: ${err instanceof Error ? err.message : String(err)}`));
      process.exitCode = 1;
    }
  }
}

main().catch((err) => {
  console.error(c.error(`✖ ${err instanceof Error ? err.stack ?? err.message : String(err)}`));
  process.exitCode = 1;
});
