import { describe, expect, it } from "vitest";

import {
  createToolRegistry,
  dispatchToolCalls,
  extractToolCalls,
  createBuiltinToolRegistry,
} from "../../../stage-1-tool-system/src/index.js";
import { extractFinalAnswer } from "../answer.js";
import {
  buildFollowUpPrompt,
  buildInitialPrompt,
  renderCatalog,
} from "../prompt.js";

describe("renderCatalog", () => {
  it("lists one tool per line", () => {
    expect(
      renderCatalog([
        { name: "sum", description: "Add numbers." },
        { name: "count_words", description: "Count words." },
      ])
    ).toBe("- sum: Add numbers.\n- count_words: Count words.");
  });

  it("says so when there are no tools", () => {
    expect(renderCatalog(createToolRegistry().catalog())).toBe(
      "(no tools available)"
    );
  });
});

describe("buildInitialPrompt", () => {
  it("contains the catalog, the call syntax and the query last", () => {
    const prompt = buildInitialPrompt("What is 2 + 2?", [
      { name: "sum", description: "Add numbers." },
    ]);

    expect(prompt).toContain("Available tools:\n- sum: Add numbers.\n");
    expect(prompt).toContain("TOOL_CALL: tool_name(arg1, arg2)");
    expect(prompt).toContain("TOOL_CALL: square_root(144)");
    expect(prompt.endsWith(
      "Query: What is 2 + 2?\n\nThink step by step and use tools when necessary:"
    )).toBe(true);
  });
});

describe("buildFollowUpPrompt", () => {
  it("renders one line per result in order", () => {
    const registry = createBuiltinToolRegistry();
    const previous = "TOOL_CALL: is_prime(7)\nTOOL_CALL: missing(1)";
    const results = dispatchToolCalls(registry, extractToolCalls(previous));

    const prompt = buildFollowUpPrompt("Is 7 prime?", previous, results);

    expect(prompt).toContain(`Previous reasoning:\n${previous}\n`);
    expect(prompt).toContain(
      'Tool results:\nis_prime(7) = true\nmissing(1) -> error: unknown tool "missing"\n'
    );
    expect(prompt.endsWith("Original query: Is 7 prime?")).toBe(true);
  });
});

describe("extractFinalAnswer", () => {
  it("returns the last non-empty trimmed line", () => {
    expect(extractFinalAnswer("Step one.\n  Answer: 34  \n\n")).toBe("Answer: 34");
  });

  it("skips directive lines", () => {
    expect(
      extractFinalAnswer("The answer is 12.\n  TOOL_CALL: sum(5, 7)\n")
    ).toBe("The answer is 12.");
  });

  it("returns an empty string when nothing is left", () => {
    expect(extractFinalAnswer("")).toBe("");
    expect(extractFinalAnswer("\n \nTOOL_CALL: sum(1)")).toBe("");
  });

  it("handles CRLF line endings", () => {
    expect(extractFinalAnswer("a\r\nb\r\n")).toBe("b");
  });
});
