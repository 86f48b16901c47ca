/**
 * Reasoning Session: drives one query through
 * idle -> awaiting_initial_response -> extracting_calls -> dispatching
 *   -> awaiting_final_response -> extracting_calls -> ... -> done
 * with `error` on model failure and `cancelled` when the caller aborts.
 */

import { ModelCommunicationError } from "../../stage-0-model-gateway/src/index.js";
import {
  dispatchToolCalls,
  extractToolCalls,
  formatToolResult,
  formatToolValue,
  type ToolResult,
} from "../../stage-1-tool-system/src/index.js";
import { extractFinalAnswer } from "./answer.js";
import { createConsoleSessionLogger } from "./logger.js";
import { buildFollowUpPrompt, buildInitialPrompt } from "./prompt.js";
import type {
  ReasoningDeps,
  ReasoningOptions,
  ReasoningResult,
  SessionState,
  SessionStatus,
  ToolRound,
  ToolUsage,
  TranscriptEntry,
} from "./types.js";

export const DEFAULT_MAX_TOOL_ROUNDS = 3;

/** Raised internally when the signal fires between suspension points. */
export class SessionCancelledError extends Error {
  constructor(message = "Reasoning session was cancelled") {
    super(message);
    this.name = "SessionCancelledError";
  }
}

function generateSessionId(): string {
  return `sess_${Date.now().toString(36)}_${Math.random()
    .toString(36)
    .slice(2, 10)}`;
}

function nowIso(): string {
  return new Date().toISOString();
}

function toToolUsage(result: ToolResult): ToolUsage {
  return {
    tool: result.request.name,
    arguments: result.request.rawArguments.join(", "),
    result: result.success
      ? formatToolValue(result.value, result.returns)
      : result.error.message,
    success: result.success,
  };
}

function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new SessionCancelledError();
  }
}

export async function runReasoningSession(
  deps: ReasoningDeps,
  query: string,
  options: ReasoningOptions = {}
): Promise<ReasoningResult> {
  const sessionId = options.sessionId ?? generateSessionId();
  const maxToolRounds = options.maxToolRounds ?? DEFAULT_MAX_TOOL_ROUNDS;
  const logger = deps.logger ?? createConsoleSessionLogger("info");
  const { signal } = options;

  if (!Number.isInteger(maxToolRounds) || maxToolRounds < 0) {
    throw new RangeError(
      `maxToolRounds must be a non-negative integer, got ${maxToolRounds}`
    );
  }

  const transcript: TranscriptEntry[] = [];
  const rounds: ToolRound[] = [];
  let state: SessionState = "idle";

  const moveTo = (next: SessionState) => {
    const from = state;
    state = next;
    logger.logTransition({ timestamp: nowIso(), sessionId, from, to: next });
    options.onTransition?.(from, next);
  };

  const finish = (
    status: SessionStatus,
    extra: Pick<ReasoningResult, "answer" | "error"> & {
      maxRoundsReached?: boolean;
    } = {}
  ): ReasoningResult => ({
    sessionId,
    query,
    status,
    state,
    answer: extra.answer,
    transcript,
    rounds,
    toolsUsed: rounds.flatMap((r) => r.results.map(toToolUsage)),
    maxRoundsReached: extra.maxRoundsReached ?? false,
    error: extra.error,
  });

  const send = async (
    prompt: string,
    next: "awaiting_initial_response" | "awaiting_final_response",
    maxTokens: number | undefined
  ): Promise<string> => {
    throwIfCancelled(signal);
    moveTo(next);
    transcript.push({ role: "user", content: prompt, timestamp: nowIso() });
    const text = await deps.model.complete(prompt, { signal, maxTokens });
    // A response that lands after cancellation is dropped.
    throwIfCancelled(signal);
    transcript.push({ role: "assistant", content: text, timestamp: nowIso() });
    return text;
  };

  try {
    let text = await send(
      buildInitialPrompt(query, deps.registry.catalog()),
      "awaiting_initial_response",
      options.initialMaxTokens
    );

    for (;;) {
      moveTo("extracting_calls");
      const requests = extractToolCalls(text);

      if (requests.length === 0) {
        moveTo("done");
        return finish("done", { answer: extractFinalAnswer(text) });
      }
      if (rounds.length >= maxToolRounds) {
        moveTo("done");
        return finish("done", { answer: text, maxRoundsReached: true });
      }

      moveTo("dispatching");
      const results = dispatchToolCalls(deps.registry, requests);
      const round = rounds.length + 1;
      rounds.push({ round, modelText: text, results });
      for (const result of results) {
        logger.logToolResult({
          timestamp: nowIso(),
          sessionId,
          round,
          call: formatToolResult(result),
          success: result.success,
          error: result.success ? undefined : result.error.kind,
        });
      }
      options.onToolResults?.(round, results);

      text = await send(
        buildFollowUpPrompt(query, text, results),
        "awaiting_final_response",
        options.followUpMaxTokens
      );
    }
  } catch (err) {
    if (err instanceof SessionCancelledError || signal?.aborted) {
      moveTo("cancelled");
      return finish("cancelled");
    }
    if (err instanceof ModelCommunicationError) {
      const failedIn = state;
      moveTo("error");
      logger.logFailure({
        timestamp: nowIso(),
        sessionId,
        state: failedIn,
        error: { name: err.name, message: err.message },
      });
      return finish("failed", { error: err });
    }
    throw err;
  }
}
