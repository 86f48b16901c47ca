import {
  shouldLog,
  toJsonLine,
  type LogLevel,
} from "../../stage-0-model-gateway/src/index.js";
import type {
  SessionFailureLog,
  SessionLogger,
  ToolResultLog,
  TransitionLog,
} from "./types.js";

export function createConsoleSessionLogger(
  level: LogLevel = "info"
): SessionLogger {
  return {
    logTransition(entry: TransitionLog) {
      if (shouldLog(level, "info")) {
        console.log(toJsonLine("session_transition", entry));
      }
    },
    logToolResult(entry: ToolResultLog) {
      if (shouldLog(level, "info")) {
        console.log(toJsonLine("tool_result", entry));
      }
    },
    logFailure(entry: SessionFailureLog) {
      if (shouldLog(level, "error")) {
        console.error(toJsonLine("session_failure", entry));
      }
    },
  };
}

export const silentSessionLogger: SessionLogger = {
  logTransition() {},
  logToolResult() {},
  logFailure() {},
};
