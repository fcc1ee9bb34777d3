import { describe, expect, test } from "vitest";
import { REVIEW_OPTIONS_PROMPT } from "../../config/constants.js";
import { replaceWordInAllSentences, reviewInteractively } from "../../review/machine.js";
import type { DictionaryDocument } from "../../dictionary/dictionary.js";
import { MemoryDictionary, captureOutput, scriptedPrompter, silent } from "../helpers.js";

function catDictionary(): DictionaryDocument {
  return {
    cat: { whole: "cat", PI: { L1: "kat", L2: null } },
    dog: { whole: "dog", PI: { L1: "dôg" } },
  };
}

function setup(answers: string[], document: DictionaryDocument = catDictionary()) {
  const dictionary = new MemoryDictionary(document);
  const prompter = scriptedPrompter(answers);
  const output = captureOutput();
  return {
    dictionary,
    prompter,
    lines: output.lines,
    deps: { dictionary, prompter, print: output.print, log: silent },
  };
}

test("replaceWordInAllSentences rewrites every sentence", () => {
  const sentences = ["Cat one.", "No match.", "CAT and cat."];
  replaceWordInAllSentences(sentences, "cat", "kat");
  expect(sentences).toEqual(["Kat one.", "No match.", "KAT and kat."]);
});

describe("reviewInteractively", () => {
  test("shows the highlighted sentence and the entry", async () => {
    const { deps, lines } = setup(["q"]);
    const outcome = await reviewInteractively(["the cat saw the cat"], 0, "L1", deps, {
      startWordIndex: 4,
    });

    expect(outcome).toEqual({ reason: "quit", cursor: { sentenceIndex: 0, wordIndex: 4 } });
    expect(lines).toEqual([
      "",
      "the cat saw the >cat<",
      "",
      "PI Entry: cat",
      "L1 word: kat",
      "",
      "Exiting interactive transcription.",
    ]);
  });

  test("prompts with the options line, preceded by an empty line", async () => {
    const { deps, prompter } = setup(["q"]);
    await reviewInteractively(["cat"], 0, "L1", deps);
    expect(prompter.prompts).toEqual([`\n${REVIEW_OPTIONS_PROMPT}`]);
  });

  test("suggests close entries for unknown words", async () => {
    const { deps, lines } = setup(["q"]);
    await reviewInteractively(["cot"], 0, "L1", deps);
    expect(lines.slice(1, 5)).toEqual([
      ">cot<",
      "",
      "No PI entry found for this word.",
      "Similar entries: cat, dog",
    ]);
  });

  test("accept replaces the word in every sentence", async () => {
    const { deps, lines } = setup(["n", "a", "q"]);
    const sentences = ["The cat sat.", "A dog ran.", "My Cat slept."];

    const outcome = await reviewInteractively(sentences, 0, "L1", deps);

    expect(sentences).toEqual(["The kat sat.", "A dog ran.", "My Kat slept."]);
    expect(lines).toContain("All occurrences of 'cat' replaced with 'kat'");
    expect(outcome).toEqual({ reason: "quit", cursor: { sentenceIndex: 0, wordIndex: 2 } });
  });

  test("accept without a spelling reports and stays put", async () => {
    const { deps, lines } = setup(["a", "q"]);
    const sentences = ["zebra"];

    const outcome = await reviewInteractively(sentences, 0, "L1", deps);

    expect(sentences).toEqual(["zebra"]);
    expect(lines).toContain("No PI entry found for 'zebra'.");
    expect(outcome.cursor).toEqual({ sentenceIndex: 0, wordIndex: 0 });
  });

  test("a null spelling for the variation counts as missing", async () => {
    const { deps, lines } = setup(["a", "q"]);
    const sentences = ["cat"];

    await reviewInteractively(sentences, 0, "L2", deps);

    expect(sentences).toEqual(["cat"]);
    expect(lines).toContain("L2 word: (none)");
    expect(lines).toContain("No PI entry found for 'cat'.");
  });

  test("customize uses the typed spelling everywhere", async () => {
    const { deps, lines } = setup(["c", "kitty", "q"]);
    const sentences = ["cat and cat.", "Cat!"];

    const outcome = await reviewInteractively(sentences, 0, "L1", deps);

    expect(sentences).toEqual(["kitty and kitty.", "Kitty!"]);
    expect(lines).toContain("Word 'cat' replaced with customized version 'kitty'");
    expect(outcome.cursor).toEqual({ sentenceIndex: 0, wordIndex: 1 });
  });

  test("customize falls back to the dictionary spelling", async () => {
    const { deps, prompter } = setup(["c", "  ", "q"]);
    const sentences = ["cat and dog."];

    await reviewInteractively(sentences, 0, "L1", deps);

    expect(sentences).toEqual(["kat and dog."]);
    expect(prompter.prompts[1]).toBe("Enter a customized version for 'kat': ");
  });

  test("customize on the last word rolls over to the next sentence", async () => {
    const { deps } = setup(["c", "", "q"]);
    const outcome = await reviewInteractively(["cat", "dog"], 0, "L1", deps);
    expect(outcome.cursor).toEqual({ sentenceIndex: 1, wordIndex: 0 });
  });

  test("next walks across sentences until exhausted", async () => {
    const { deps, prompter } = setup(["n", "", "n"]);
    const outcome = await reviewInteractively(["One two.", "Three four."], 0, "L1", deps, {
      startWordIndex: 1,
    });

    expect(outcome).toEqual({ reason: "exhausted", cursor: { sentenceIndex: 2, wordIndex: 0 } });
    expect(prompter.prompts).toHaveLength(3);
  });

  test("two nexts from (0, 1) land on (1, 1)", async () => {
    const { deps } = setup(["n", "n"]);
    const outcome = await reviewInteractively(["One two.", "Three four."], 0, "L1", deps, {
      startWordIndex: 1,
    });
    // Input runs out on the third question
    expect(outcome).toEqual({ reason: "quit", cursor: { sentenceIndex: 1, wordIndex: 1 } });
  });

  test("previous moves back and stops at the first word", async () => {
    const { deps } = setup(["n", "n", "p", "p", "p", "q"]);
    const outcome = await reviewInteractively(["One two.", "Three."], 0, "L1", deps);
    expect(outcome.cursor).toEqual({ sentenceIndex: 0, wordIndex: 0 });
  });

  test("skip jumps to the next sentence", async () => {
    const { deps } = setup(["s", "q"]);
    const outcome = await reviewInteractively(["One two.", "Three four."], 0, "L1", deps);
    expect(outcome.cursor).toEqual({ sentenceIndex: 1, wordIndex: 0 });
  });

  test("invalid commands change nothing", async () => {
    const { deps, lines } = setup(["x", "q"]);
    const sentences = ["cat"];

    const outcome = await reviewInteractively(sentences, 0, "L1", deps);

    expect(sentences).toEqual(["cat"]);
    expect(lines).toContain(
      "Invalid input. Please choose 'a', 'n', '', 'p', 'e', 'c', 's', or 'q'."
    );
    expect(outcome.cursor).toEqual({ sentenceIndex: 0, wordIndex: 0 });
  });

  test("edit reloads the dictionary before the next command", async () => {
    const dictionary = new MemoryDictionary(catDictionary(), (word, document) => {
      document[word] = { whole: word, PI: { L1: "zeebra" } };
    });
    const prompter = scriptedPrompter(["e", "a", "q"]);
    const sentences = ["Zebra dog"];

    const outcome = await reviewInteractively(sentences, 0, "L1", {
      dictionary,
      prompter,
      print: silent,
      log: silent,
    });

    expect(dictionary.editedWords).toEqual(["zebra"]);
    expect(dictionary.reloadCount).toBe(1);
    expect(sentences).toEqual(["Zeebra dog"]);
    expect(outcome.cursor).toEqual({ sentenceIndex: 0, wordIndex: 1 });
  });

  test("starts at the requested sentence", async () => {
    const { deps, lines } = setup(["q"]);
    await reviewInteractively(["First.", "Second."], 1, "L1", deps);
    expect(lines[1]).toBe(">Second<.");
  });

  test("an empty sentence list ends at once", async () => {
    const { deps, prompter } = setup([]);
    const outcome = await reviewInteractively([], 0, "L1", deps);
    expect(outcome.reason).toBe("exhausted");
    expect(prompter.prompts).toEqual([]);
  });
});
