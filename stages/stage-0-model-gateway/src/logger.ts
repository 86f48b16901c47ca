import type {
  ErrorLog,
  RequestLog,
  RequestLogger,
  ResponseLog,
} from "./types.js";

export type LogLevel = "silent" | "error" | "info";

/** Info entries print only at "info"; error entries at "info" and "error". */
export function shouldLog(
  level: LogLevel,
  entryLevel: "info" | "error"
): boolean {
  if (level === "silent") {
    return false;
  }
  return entryLevel === "error" || level === "info";
}

export function toJsonLine(
  event: string,
  entry: object
): string {
  return JSON.stringify({ event, ...entry });
}

export function createConsoleLogger(level: LogLevel = "info"): RequestLogger {
  return {
    logRequest(entry: RequestLog) {
      if (shouldLog(level, "info")) {
        console.log(toJsonLine("model_request", entry));
      }
    },
    logResponse(entry: ResponseLog) {
      if (shouldLog(level, "info")) {
        console.log(toJsonLine("model_response", entry));
      }
    },
    logError(entry: ErrorLog) {
      if (shouldLog(level, "error")) {
        console.error(toJsonLine("model_error", entry));
      }
    },
  };
}
