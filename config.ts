import fs from "fs";
import path from "path";
import { c } from "./colors";
import { IndentUnit } from "./render";

export const CONFIG_FILE = "snakecast.config.json";

export interface SnakecastConfig {
  outDir: string;
  indent: IndentUnit;
  verbose: boolean;
}

export const DEFAULT_CONFIG: SnakecastConfig = { outDir: "out", indent: 4, verbose: false };

export function parseIndent(value : unknown) : IndentUnit | undefined {
  if (value === "tab") return "tab";
  if (typeof value === "string" && /^\d+$/.test(value)) return parseIndent(Number(value));
  if (typeof value === "number" && Number.isInteger(value) && value > 0) return value;
  return undefined;
}

// Bad values fall back to their defaults, one warning each.
export function validateConfig(raw : unknown, warn : (message : string) => void) : SnakecastConfig {
  const config = { ...DEFAULT_CONFIG };
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    warn(`${CONFIG_FILE} must contain a JSON object, using defaults.`);
    return config;
  }
  const entries : Array<[string, unknown]> = Object.entries(raw);
  for (const [key, value] of entries) {
    switch (key) {
      case "outDir":
        if (typeof value === "string" && value.trim() !== "") config.outDir = value;
        else warn(`'outDir' must be a non-empty string, using '${DEFAULT_CONFIG.outDir}'.`);
        break;
      case "indent": {
        const indent = typeof value === "string" && value !== "tab" ? undefined : parseIndent(value);
        if (indent !== undefined) config.indent = indent;
        else warn(`'indent' must be a positive integer or "tab", using ${DEFAULT_CONFIG.indent}.`);
        break;
      }
      case "verbose":
        if (typeof value === "boolean") config.verbose = value;
        else warn(`'verbose' must be true or false, using ${DEFAULT_CONFIG.verbose}.`);
        break;
      default:
        warn(`Unknown option '${key}' in ${CONFIG_FILE}.`);
    }
  }
  return config;
}

export function loadConfig(projectPath = process.cwd()) : SnakecastConfig {
  const configPath = path.join(projectPath, CONFIG_FILE);
  if (!fs.existsSync(configPath)) return { ...DEFAULT_CONFIG };

  let parsed : unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, "utf8"));
  } catch (e) {
    console.error(c.error(`Could not parse ${CONFIG_FILE}, using defaults.`));
    console.error(e);
    return { ...DEFAULT_CONFIG };
  }
  return validateConfig(parsed, (message) => console.error(c.warn(`⚠ ${message}`)));
}
