import type { Logger } from "./logger.js";

export function blankLine(print: Logger): void {
  print("");
}

/** Print text preceded by an empty line. */
export function printWithSpacing(print: Logger, text: string): void {
  blankLine(print);
  print(text);
}
