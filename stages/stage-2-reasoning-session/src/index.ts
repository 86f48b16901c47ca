export { extractFinalAnswer } from "./answer.js";
export { createConsoleSessionLogger, silentSessionLogger } from "./logger.js";
export {
  buildFollowUpPrompt,
  buildInitialPrompt,
  renderCatalog,
} from "./prompt.js";
export { createReasoner } from "./reasoner.js";
export type { Reasoner, ReasonerDefaults } from "./reasoner.js";
export { runShellQuery } from "./shell.js";
export type { ShellReply } from "./shell.js";
export {
  DEFAULT_MAX_TOOL_ROUNDS,
  runReasoningSession,
  SessionCancelledError,
} from "./session.js";
export type {
  ReasoningDeps,
  ReasoningOptions,
  ReasoningResult,
  SessionFailureLog,
  SessionLogger,
  SessionState,
  SessionStatus,
  ToolResultLog,
  ToolRound,
  ToolUsage,
  TranscriptEntry,
  TransitionLog,
} from "./types.js";
