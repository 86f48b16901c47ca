import { runReasoningSession, SessionCancelledError } from "./session.js";
import type {
  ReasoningDeps,
  ReasoningOptions,
  ReasoningResult,
} from "./types.js";

/** Per-session options that stay fixed across queries. */
export type ReasonerDefaults = Omit<ReasoningOptions, "signal" | "sessionId">;

export interface Reasoner {
  /** Full session result; never rejects for model failures or cancellation. */
  run(query: string, options?: ReasoningOptions): Promise<ReasoningResult>;
  /** Final answer text; rejects with the session's error or SessionCancelledError. */
  answer(query: string, options?: ReasoningOptions): Promise<string>;
}

export function createReasoner(
  deps: ReasoningDeps,
  defaults: ReasonerDefaults = {}
): Reasoner {
  const run = (query: string, options: ReasoningOptions = {}) =>
    runReasoningSession(deps, query, { ...defaults, ...options });

  return {
    run,
    async answer(query, options) {
      const result = await run(query, options);
      if (result.status === "cancelled") {
        throw new SessionCancelledError();
      }
      if (result.error) {
        throw result.error;
      }
      return result.answer ?? "";
    },
  };
}
