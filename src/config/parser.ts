import path from "node:path";
import process from "node:process";
import { parseArgs } from "node:util";
import { fileURLToPath } from "node:url";
import { ConfigError } from "../errors.js";
import { DEFAULT_VARIATION } from "./constants.js";
import type { ParseResult } from "../types.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Same relative location from src/config and dist/config
const BUNDLED_DICTIONARY = path.resolve(__dirname, "../../data/dictionary.json");

function resolvePath(p: string): string {
  return path.isAbsolute(p) ? p : path.resolve(process.cwd(), p);
}

function isTruthyFlag(value: string | undefined): boolean {
  return value === "1" || value === "true";
}

function parseStartSentence(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigError(`--start must be a positive integer, got "${value}".`);
  }
  return parsed;
}

export function parseConfig(
  args: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): ParseResult {
  const {
    values: { dictionary, variation, input, output, interactive, start, debug },
    positionals,
  } = parseArgs({
    args,
    options: {
      dictionary: {
        type: "string",
        short: "d",
        default: env["PI_DICTIONARY"] ?? BUNDLED_DICTIONARY,
      },
      variation: {
        type: "string",
        short: "v",
        default: env["PI_VARIATION"] ?? DEFAULT_VARIATION,
      },
      input: {
        type: "string",
        short: "i",
      },
      output: {
        type: "string",
        short: "o",
      },
      interactive: {
        type: "boolean",
        default: isTruthyFlag(env["PI_INTERACTIVE"]),
      },
      start: {
        type: "string",
        default: "1",
      },
      debug: {
        type: "boolean",
        default: isTruthyFlag(env["DEBUG"]),
      },
    },
    allowPositionals: true,
  });

  const variationValue = (variation ?? DEFAULT_VARIATION).trim();
  if (!variationValue) {
    throw new ConfigError("--variation must not be empty.");
  }

  return {
    config: {
      dictionaryPath: resolvePath(dictionary ?? BUNDLED_DICTIONARY),
      variation: variationValue,
      inputPath: input ? resolvePath(input) : undefined,
      outputPath: output ? resolvePath(output) : undefined,
      interactive: interactive ?? false,
      startSentence: parseStartSentence(start ?? "1"),
      debug: debug ?? false,
    },
    text: positionals.length > 0 ? positionals.join(" ") : undefined,
  };
}
