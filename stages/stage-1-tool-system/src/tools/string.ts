import type { ToolDefinition } from "../types.js";

const VOWELS = /[aeiou]/gi;
const CONSONANTS = /[bcdfghjklmnpqrstvwxyz]/gi;
const LETTER = /\p{L}/gu;
const DIGIT = /\p{Nd}/gu;
const UPPERCASE = /\p{Lu}/gu;
const LOWERCASE = /\p{Ll}/gu;
const SPECIAL = /[^\p{L}\p{N}\s]/gu;

function countMatches(text: string, pattern: RegExp): number {
  return text.match(pattern)?.length ?? 0;
}

function words(text: string): string[] {
  return text.split(/\s+/).filter((w) => w !== "");
}

const textOnly = { parameters: ["string" as const], returns: "integer" as const };

export const countVowelsTool: ToolDefinition = {
  name: "count_vowels",
  description: "Count the vowels (a, e, i, o, u) in a string.",
  signature: textOnly,
  execute(text: string) {
    return countMatches(text, VOWELS);
  },
};

export const countConsonantsTool: ToolDefinition = {
  name: "count_consonants",
  description: "Count the consonants in a string.",
  signature: textOnly,
  execute(text: string) {
    return countMatches(text, CONSONANTS);
  },
};

export const countLettersTool: ToolDefinition = {
  name: "count_letters",
  description: "Count the letters (alphabetic characters) in a string.",
  signature: textOnly,
  execute(text: string) {
    return countMatches(text, LETTER);
  },
};

export const countWordsTool: ToolDefinition = {
  name: "count_words",
  description: "Count the words in a string.",
  signature: textOnly,
  execute(text: string) {
    return words(text).length;
  },
};

export const countCharactersTool: ToolDefinition = {
  name: "count_characters",
  description: "Count all characters in a string.",
  signature: textOnly,
  execute(text: string) {
    return Array.from(text).length;
  },
};

export const countCharactersNoSpacesTool: ToolDefinition = {
  name: "count_characters_no_spaces",
  description: "Count the characters in a string, excluding spaces.",
  signature: textOnly,
  execute(text: string) {
    return Array.from(text.replaceAll(" ", "")).length;
  },
};

export const countDigitsTool: ToolDefinition = {
  name: "count_digits",
  description: "Count the digits in a string.",
  signature: textOnly,
  execute(text: string) {
    return countMatches(text, DIGIT);
  },
};

export const countUppercaseTool: ToolDefinition = {
  name: "count_uppercase",
  description: "Count the uppercase letters in a string.",
  signature: textOnly,
  execute(text: string) {
    return countMatches(text, UPPERCASE);
  },
};

export const countLowercaseTool: ToolDefinition = {
  name: "count_lowercase",
  description: "Count the lowercase letters in a string.",
  signature: textOnly,
  execute(text: string) {
    return countMatches(text, LOWERCASE);
  },
};

export const countSpecialCharactersTool: ToolDefinition = {
  name: "count_special_characters",
  description: "Count the characters that are neither letters, digits nor whitespace.",
  signature: textOnly,
  execute(text: string) {
    return countMatches(text, SPECIAL);
  },
};

export const getWordLengthTool: ToolDefinition = {
  name: "get_word_length",
  description: "Get the length of a word, ignoring spaces.",
  signature: textOnly,
  execute(word: string) {
    return Array.from(word.replaceAll(" ", "")).length;
  },
};

export const findLongestWordTool: ToolDefinition = {
  name: "find_longest_word",
  description: "Find the longest word in a string (first one wins on ties).",
  signature: { parameters: ["string"], returns: "string" },
  execute(text: string) {
    return words(text).reduce(
      (longest, w) => (w.length > longest.length ? w : longest),
      ""
    );
  },
};

export const findShortestWordTool: ToolDefinition = {
  name: "find_shortest_word",
  description: "Find the shortest word in a string (first one wins on ties).",
  signature: { parameters: ["string"], returns: "string" },
  execute(text: string) {
    const all = words(text);
    return all.reduce(
      (shortest, w) => (w.length < shortest.length ? w : shortest),
      all[0] ?? ""
    );
  },
};

export const countOccurrencesTool: ToolDefinition = {
  name: "count_occurrences",
  description:
    "Count non-overlapping, case-insensitive occurrences of substring in text: count_occurrences(text, substring).",
  signature: { parameters: ["string", "string"], returns: "integer" },
  execute(text: string, substring: string) {
    if (substring === "") {
      return Array.from(text).length + 1;
    }
    return text.toLowerCase().split(substring.toLowerCase()).length - 1;
  },
};

export const isPalindromeTool: ToolDefinition = {
  name: "is_palindrome",
  description: "Check whether a string reads the same backwards, ignoring case and punctuation.",
  signature: { parameters: ["string"], returns: "boolean" },
  execute(text: string) {
    const cleaned = text.toLowerCase().replace(/[^a-z0-9]/g, "");
    return cleaned === Array.from(cleaned).reverse().join("");
  },
};

export const STRING_TOOLS: readonly ToolDefinition[] = [
  countVowelsTool,
  countConsonantsTool,
  countLettersTool,
  countWordsTool,
  countCharactersTool,
  countCharactersNoSpacesTool,
  countDigitsTool,
  countUppercaseTool,
  countLowercaseTool,
  countSpecialCharactersTool,
  getWordLengthTool,
  findLongestWordTool,
  findShortestWordTool,
  countOccurrencesTool,
  isPalindromeTool,
];
