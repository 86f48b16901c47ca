export class DuplicateNameError extends Error {
  readonly toolName: string;

  constructor(toolName: string) {
    super(`Tool already registered: ${toolName}`);
    this.name = "DuplicateNameError";
    this.toolName = toolName;
  }
}

export class InvalidToolNameError extends Error {
  readonly toolName: string;

  constructor(toolName: string) {
    super(`Tool name must be a bare identifier: "${toolName}"`);
    this.name = "InvalidToolNameError";
    this.toolName = toolName;
  }
}

/** Per-call; recovered into a failed ToolResult. */
export class UnknownToolError extends Error {
  readonly kind = "UnknownToolError";
  readonly toolName: string;

  constructor(toolName: string) {
    super(`unknown tool "${toolName}"`);
    this.name = "UnknownToolError";
    this.toolName = toolName;
  }
}

/** Per-call; arity, argument kind or domain failure inside the tool. */
export class ToolExecutionError extends Error {
  readonly kind = "ToolExecutionError";
  readonly toolName: string;

  constructor(toolName: string, reason: string, options?: { cause?: unknown }) {
    super(reason, options);
    this.name = "ToolExecutionError";
    this.toolName = toolName;
  }
}
