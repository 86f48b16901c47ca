export { coerceArgument, coerceArguments } from "./coerce.js";
export {
  dispatchToolCall,
  dispatchToolCalls,
  formatToolResult,
  formatToolValue,
} from "./dispatch.js";
export {
  DuplicateNameError,
  InvalidToolNameError,
  ToolExecutionError,
  UnknownToolError,
} from "./errors.js";
export {
  extractToolCalls,
  isToolCallLine,
  scanToolCalls,
  TOOL_CALL_PREFIX,
} from "./extract.js";
export {
  createToolRegistry,
  signatureToSchema,
  TOOL_NAME_PATTERN,
} from "./registry.js";
export {
  BUILTIN_TOOLS,
  createBuiltinToolRegistry,
  MATH_TOOLS,
  STRING_TOOLS,
} from "./tools/index.js";
export {
  compileValidator,
  formatAjvErrors,
} from "./validate.js";
export type { Validator } from "./validate.js";
export type {
  CatalogEntry,
  JsonSchema,
  ParameterKind,
  ReadonlyToolRegistry,
  ReturnKind,
  ToolArgument,
  ToolCallError,
  ToolDefinition,
  ToolInvocationRequest,
  ToolOutput,
  ToolRegistry,
  ToolResult,
  ToolSignature,
  ToolSpec,
  TypedValue,
} from "./types.js";
