import type { Interface as ReadlineInterface } from "node:readline/promises";

/**
 * Source of answers to console questions.
 * `undefined` means input was closed (Ctrl+D, end of piped stdin).
 */
export interface Prompter {
  ask(prompt: string): Promise<string | undefined>;
}

function isClosedError(error: unknown): boolean {
  if (error && typeof error === "object" && "code" in error) {
    const { code } = error;
    return code === "ERR_USE_AFTER_CLOSE" || code === "ABORT_ERR";
  }
  return false;
}

/**
 * Prompter over a readline interface. Lines are pulled from the
 * interface's line iterator, so lines that arrive before they are asked
 * for stay queued, and closed input is only reported once the queue is
 * drained.
 */
export function createReadlinePrompter(rl: ReadlineInterface): Prompter {
  const lines = rl[Symbol.asyncIterator]();
  let closed = false;
  rl.once("close", () => {
    closed = true;
  });

  return {
    async ask(prompt: string): Promise<string | undefined> {
      if (!closed) {
        try {
          rl.setPrompt(prompt);
          rl.prompt();
        } catch (error) {
          if (!isClosedError(error)) throw error;
        }
      }
      const next = await lines.next();
      return next.done ? undefined : next.value;
    },
  };
}

/** Ask a question preceded by an empty line. */
export async function inputWithSpacing(
  prompter: Prompter,
  prompt: string
): Promise<string | undefined> {
  return prompter.ask(`\n${prompt}`);
}
