import path from "node:path";
import process from "node:process";
import { expect, test } from "vitest";
import { parseConfig } from "../../config/parser.js";
import { ConfigError } from "../../errors.js";

test("reads flags and joins positional text", () => {
  const { config, text } = parseConfig(
    ["--variation", "L2", "--start", "3", "--interactive", "hello", "world"],
    {}
  );

  expect(config.variation).toBe("L2");
  expect(config.startSentence).toBe(3);
  expect(config.interactive).toBe(true);
  expect(config.debug).toBe(false);
  expect(text).toBe("hello world");
});

test("falls back to environment variables and defaults", () => {
  const { config, text } = parseConfig([], {
    PI_VARIATION: "L3",
    PI_DICTIONARY: "/tmp/pi/dictionary.json",
    DEBUG: "1",
  });

  expect(config.variation).toBe("L3");
  expect(config.dictionaryPath).toBe("/tmp/pi/dictionary.json");
  expect(config.debug).toBe(true);
  expect(config.startSentence).toBe(1);
  expect(config.inputPath).toBeUndefined();
  expect(text).toBeUndefined();
});

test("resolves relative paths against the working directory", () => {
  const { config } = parseConfig(["-d", "words.json", "-i", "in.txt", "-o", "out.txt"], {});

  expect(config.dictionaryPath).toBe(path.resolve(process.cwd(), "words.json"));
  expect(config.inputPath).toBe(path.resolve(process.cwd(), "in.txt"));
  expect(config.outputPath).toBe(path.resolve(process.cwd(), "out.txt"));
});

test("uses the bundled dictionary by default", () => {
  const { config } = parseConfig([], {});
  expect(path.basename(config.dictionaryPath)).toBe("dictionary.json");
  expect(path.basename(path.dirname(config.dictionaryPath))).toBe("data");
});

test("rejects invalid values", () => {
  expect(() => parseConfig(["--start", "0"], {})).toThrow(ConfigError);
  expect(() => parseConfig(["--start", "two"], {})).toThrow(
    '--start must be a positive integer, got "two".'
  );
  expect(() => parseConfig(["--variation", " "], {})).toThrow("--variation must not be empty.");
});
