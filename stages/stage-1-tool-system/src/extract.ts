/**
 * Tool-call extraction: find `TOOL_CALL: name(arg, arg)` directives in model text.
 * Pure; text around the directives is ignored.
 */

import type { ToolInvocationRequest } from "./types.js";

export const TOOL_CALL_PREFIX = "TOOL_CALL:";

const CALL_HEAD_SOURCE = String.raw`TOOL_CALL:\s*([A-Za-z_]\w*)\(`;

/**
 * Read the argument list that starts after the "(" at `open`.
 * Commas split arguments only at parenthesis depth 0; quotes carry no meaning
 * here. The list must close on the same line, otherwise there is no match.
 */
function readArgumentList(
  text: string,
  open: number
): { tokens: string[]; end: number } | undefined {
  const tokens: string[] = [];
  let depth = 0;
  let tokenStart = open + 1;

  for (let i = open + 1; i < text.length; i++) {
    const c = text[i];
    if (c === "\n" || c === "\r") {
      return undefined;
    }
    if (c === "(") {
      depth++;
    } else if (c === ")") {
      if (depth === 0) {
        const last = text.slice(tokenStart, i).trim();
        if (tokens.length > 0 || last !== "") {
          tokens.push(last);
        }
        return { tokens, end: i };
      }
      depth--;
    } else if (c === "," && depth === 0) {
      tokens.push(text.slice(tokenStart, i).trim());
      tokenStart = i + 1;
    }
  }

  return undefined;
}

/**
 * Lazily yield requests in left-to-right order. Every call starts a fresh scan.
 * Occurrences whose parentheses do not close are skipped.
 */
export function* scanToolCalls(
  text: string
): Generator<ToolInvocationRequest, void, undefined> {
  const head = new RegExp(CALL_HEAD_SOURCE, "g");
  let match: RegExpExecArray | null;

  while ((match = head.exec(text)) !== null) {
    const open = match.index + match[0].length - 1;
    const list = readArgumentList(text, open);
    if (!list) {
      continue;
    }
    yield { name: match[1], rawArguments: list.tokens, offset: match.index };
    head.lastIndex = list.end + 1;
  }
}

export function extractToolCalls(text: string): ToolInvocationRequest[] {
  return Array.from(scanToolCalls(text));
}

/** True for a line that is itself a directive (after leading whitespace). */
export function isToolCallLine(line: string): boolean {
  return line.trimStart().startsWith(TOOL_CALL_PREFIX);
}
