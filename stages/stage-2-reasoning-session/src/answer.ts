import { isToolCallLine } from "../../stage-1-tool-system/src/index.js";

/** Last non-empty line that is not itself a `TOOL_CALL:` directive; "" if none. */
export function extractFinalAnswer(text: string): string {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "" && !isToolCallLine(line));
  return lines[lines.length - 1] ?? "";
}
