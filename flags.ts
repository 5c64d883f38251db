import { IndentUnit } from "./render";
import { parseIndent, SnakecastConfig } from "./config";

export type Flags = {
  files: Array<string>,
  outDir?: string,
  indent?: IndentUnit,
  verbose: boolean,
  version: boolean,
  help: boolean
};

export class UsageError extends Error {
  constructor(message : string) {
    super(message);
    this.name = "UsageError";
  }
}

// snakecast <file.py...> [-o dir] [--indent n|tab] [--verbose] [-v] [-h]
export function parseFlags(args : ReadonlyArray<string>) : Flags {
  const flags : Flags = { files: [], verbose: false, version: false, help: false };
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case "-o":
      case "--out-dir": {
        const value = args[++i];
        if (value === undefined || value.startsWith("-")) throw new UsageError(`${arg} expects a directory`);
        flags.outDir = value;
        break;
      }
      case "--indent": {
        const indent = parseIndent(args[++i]);
        if (indent === undefined) throw new UsageError("--indent expects a positive integer or \"tab\"");
        flags.indent = indent;
        break;
      }
      case "--verbose":
        flags.verbose = true;
        break;
      case "-v":
      case "--version":
        flags.version = true;
        break;
      case "-h":
      case "--help":
        flags.help = true;
        break;
      default:
        if (arg.startsWith("-")) throw new UsageError(`unknown flag '${arg}'`);
        flags.files.push(arg);
    }
  }
  return flags;
}

// Command-line flags win over the configuration file.
export function applyFlags(config : SnakecastConfig, flags : Flags) : SnakecastConfig {
  return {
    outDir: flags.outDir ?? config.outDir,
    indent: flags.indent ?? config.indent,
    verbose: flags.verbose || config.verbose
  };
}
