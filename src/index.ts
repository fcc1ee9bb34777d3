#!/usr/bin/env node
import "dotenv/config";
import fs from "node:fs";
import process from "node:process";
import readline from "node:readline/promises";
import { text as readStream } from "node:stream/consumers";
import { stdin as input, stdout as output } from "node:process";

import { parseConfig } from "./config/parser.js";
import { PRELIMINARY_REPLACEMENTS } from "./config/constants.js";
import { ConfigError } from "./errors.js";
import { JsonDictionary } from "./dictionary/store.js";
import { Transcriber } from "./transcribe/pipeline.js";
import { splitIntoSentences } from "./text/segment.js";
import { reviewInteractively } from "./review/machine.js";
import { createLoggers, describeError, type Loggers } from "./ui/logger.js";
import { createReadlinePrompter } from "./ui/input.js";
import { truncateMiddle, flattenWhitespace } from "./utils/strings.js";
import type { Config } from "./types.js";

async function readSourceText(config: Config, argText: string | undefined): Promise<string> {
  if (argText !== undefined) return argText;
  if (config.inputPath) return fs.readFileSync(config.inputPath, "utf8");
  if (config.interactive) {
    // stdin carries the reviewer's commands
    throw new ConfigError("Interactive review needs text from --input or an argument.");
  }
  return readStream(input);
}

function writeResult(config: Config, result: string, loggers: Loggers): void {
  const content = result.endsWith("\n") ? result : `${result}\n`;
  if (config.outputPath) {
    fs.writeFileSync(config.outputPath, content, "utf8");
    loggers.appLog(`[cli] Wrote ${result.length} characters to ${config.outputPath}`);
  } else {
    output.write(content);
  }
}

async function runInteractive(
  config: Config,
  sourceText: string,
  dictionary: JsonDictionary,
  loggers: Loggers
): Promise<string> {
  const sentences = splitIntoSentences(sourceText);
  loggers.appLog(`[cli] ${sentences.length} sentences to review`);

  const rl = readline.createInterface({ input, output });
  rl.on("SIGINT", () => {
    loggers.reviewLog("\n[cli] Caught Ctrl+C. Exiting without saving the transcript.");
    rl.close();
    process.exit(130);
  });

  try {
    const outcome = await reviewInteractively(
      sentences,
      config.startSentence - 1,
      config.variation,
      {
        dictionary,
        prompter: createReadlinePrompter(rl),
        print: loggers.reviewLog,
        log: loggers.appLog,
      }
    );
    loggers.appLog(
      `[cli] Review ended (${outcome.reason}) at sentence ${outcome.cursor.sentenceIndex + 1}`
    );
  } finally {
    rl.close();
  }
  return sentences.join(" ");
}

async function main(): Promise<void> {
  const { config, text: argText } = parseConfig();
  const loggers = createLoggers(config.debug);

  try {
    const dictionary = new JsonDictionary(
      config.dictionaryPath,
      PRELIMINARY_REPLACEMENTS,
      loggers.appLog
    );

    const variations = dictionary.variations();
    if (variations.length > 0 && !variations.includes(config.variation)) {
      loggers.appWarn(
        `[cli] No entry defines variation "${config.variation}" (known: ${variations.join(", ")})`
      );
    }

    const sourceText = await readSourceText(config, argText);
    loggers.appLog(`[cli] Input: "${truncateMiddle(flattenWhitespace(sourceText), 120)}"`);

    const result = config.interactive
      ? await runInteractive(config, sourceText, dictionary, loggers)
      : new Transcriber(dictionary, PRELIMINARY_REPLACEMENTS, loggers.appLog).transcribe(
          sourceText,
          config.variation
        );

    writeResult(config, result, loggers);
  } catch (error) {
    loggers.appError(`[cli] ${describeError(error)}`);
    process.exitCode = 1;
  }
}

try {
  await main();
} catch (error) {
  console.error(`[cli] ${describeError(error)}`);
  process.exit(1);
}
