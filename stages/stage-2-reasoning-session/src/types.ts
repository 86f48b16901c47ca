/**
 * Stage 2 Reasoning Session types.
 * One session per query: prompt, extract, dispatch, re-prompt, answer.
 */

import type {
  Message,
  ModelClient,
  ModelCommunicationError,
} from "../../stage-0-model-gateway/src/index.js";
import type {
  ReadonlyToolRegistry,
  ToolResult,
} from "../../stage-1-tool-system/src/index.js";

export type SessionState =
  | "idle"
  | "awaiting_initial_response"
  | "extracting_calls"
  | "dispatching"
  | "awaiting_final_response"
  | "done"
  | "error"
  | "cancelled";

export type SessionStatus = "done" | "failed" | "cancelled";

/** One prompt (role "user") or completion (role "assistant"). */
export interface TranscriptEntry extends Message {
  timestamp: string;
}

/** One dispatch round: the model text that was scanned and what its calls produced. */
export interface ToolRound {
  round: number;
  modelText: string;
  results: ToolResult[];
}

export interface ToolUsage {
  tool: string;
  arguments: string;
  /** Rendered value, or the error message. */
  result: string;
  success: boolean;
}

export interface TransitionLog {
  timestamp: string;
  sessionId: string;
  from: SessionState;
  to: SessionState;
}

export interface ToolResultLog {
  timestamp: string;
  sessionId: string;
  round: number;
  call: string;
  success: boolean;
  error?: string;
}

export interface SessionFailureLog {
  timestamp: string;
  sessionId: string;
  state: SessionState;
  error: { name: string; message: string };
}

export interface SessionLogger {
  logTransition(entry: TransitionLog): void;
  logToolResult(entry: ToolResultLog): void;
  logFailure(entry: SessionFailureLog): void;
}

export interface ReasoningDeps {
  model: ModelClient;
  /** Built once at start-up and shared read-only across sessions. */
  registry: ReadonlyToolRegistry;
  logger?: SessionLogger;
}

export interface ReasoningOptions {
  /** Dispatch rounds allowed before the latest text is returned as-is (default 3). */
  maxToolRounds?: number;
  /** Token limit for the first completion. */
  initialMaxTokens?: number;
  /** Token limit for completions that follow a dispatch round. */
  followUpMaxTokens?: number;
  /** Checked before each prompt is sent and after each response arrives. */
  signal?: AbortSignal;
  sessionId?: string;
  onTransition?: (from: SessionState, to: SessionState) => void;
  onToolResults?: (round: number, results: ToolResult[]) => void;
}

export interface ReasoningResult {
  sessionId: string;
  query: string;
  status: SessionStatus;
  /** Terminal state of the state machine. */
  state: SessionState;
  /** Present only when status is "done". */
  answer?: string;
  transcript: TranscriptEntry[];
  rounds: ToolRound[];
  toolsUsed: ToolUsage[];
  /** True when the session stopped because the round cap was hit. */
  maxRoundsReached: boolean;
  error?: ModelCommunicationError;
}
