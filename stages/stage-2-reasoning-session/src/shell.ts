import type { Reasoner } from "./reasoner.js";
import type { ReasoningResult } from "./types.js";

export type ShellReply =
  | { ok: true; answer: string; result: ReasoningResult }
  | { ok: false; message: string };

/** One shell turn; any failure becomes an `Error: ...` line so the prompt loop keeps going. */
export async function runShellQuery(
  reasoner: Reasoner,
  query: string
): Promise<ShellReply> {
  try {
    const result = await reasoner.run(query);
    if (result.status === "failed") {
      return {
        ok: false,
        message: `Error: ${result.error?.message ?? "unknown failure"}`,
      };
    }
    if (result.status === "cancelled") {
      return { ok: false, message: "Error: query was cancelled" };
    }
    return { ok: true, answer: result.answer ?? "", result };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, message: `Error: ${message}` };
  }
}
