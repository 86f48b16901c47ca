import {
  formatToolResult,
  TOOL_CALL_PREFIX,
  type CatalogEntry,
  type ToolResult,
} from "../../stage-1-tool-system/src/index.js";

const WORKED_EXAMPLES = [
  {
    query: "What is the square root of 144 plus 10?",
    steps: [
      "I need the square root of 144 first.",
      `${TOOL_CALL_PREFIX} square_root(144)`,
      "Then I add 10 to that result.",
    ],
  },
  {
    query: 'How many words are in "the quick brown fox"?',
    steps: [
      "I will count the words with a tool.",
      `${TOOL_CALL_PREFIX} count_words(the quick brown fox)`,
    ],
  },
];

export function renderCatalog(catalog: readonly CatalogEntry[]): string {
  if (catalog.length === 0) {
    return "(no tools available)";
  }
  return catalog.map((t) => `- ${t.name}: ${t.description}`).join("\n");
}

function renderExamples(): string {
  return WORKED_EXAMPLES.map(
    (ex) => `Query: ${ex.query}\n${ex.steps.join("\n")}`
  ).join("\n\n");
}

/** First prompt of a session: tools, syntax, examples, then the query. */
export function buildInitialPrompt(
  query: string,
  catalog: readonly CatalogEntry[]
): string {
  return `You are a careful assistant that solves problems step by step and uses tools for every calculation or text count.

Available tools:
${renderCatalog(catalog)}

Instructions:
1. Break the problem into logical steps.
2. Decide which steps need a tool. Do not do arithmetic or count characters yourself.
3. Request a tool on its own line, exactly as: ${TOOL_CALL_PREFIX} tool_name(arg1, arg2)
4. Arguments are plain numbers or words separated by commas. Do not nest tool calls.
5. Finish with the final answer on the last line.

Examples:
${renderExamples()}

Query: ${query}

Think step by step and use tools when necessary:`;
}

/** Prompt after a dispatch round: previous reasoning plus one line per result. */
export function buildFollowUpPrompt(
  query: string,
  previousText: string,
  results: readonly ToolResult[]
): string {
  const lines = results.map(formatToolResult).join("\n");
  return `Based on your previous reasoning and the tool results below, give a concise final answer.

Previous reasoning:
${previousText}

Tool results:
${lines}

If a tool reported an error, explain how that affects the answer. If you still need a tool, request it with ${TOOL_CALL_PREFIX} as before.
Put the final answer on the last line.

Original query: ${query}`;
}
