/**
 * Stage 1 Tool System types.
 * Tools are plain synchronous functions with an explicit signature; the model
 * asks for them in free text and never sees anything but names and descriptions.
 */

import type { ToolExecutionError, UnknownToolError } from "./errors.js";

/** JSON Schema (draft-07 style). */
export type JsonSchema = Record<string, unknown>;

/** Scalar produced by the argument coercer. */
export type TypedValue =
  | { kind: "integer"; value: number }
  | { kind: "float"; value: number }
  | {
      kind: "string";
      value: string;
      /** Set when the token is a numeric literal no JS number holds exactly. */
      outOfRange?: true;
    };

/** What a tool implementation receives per argument. */
export type ToolArgument = number | string;

/** What a tool implementation may return. */
export type ToolOutput = number | bigint | string | boolean;

/** Accepted kind of one positional argument. */
export type ParameterKind = "number" | "integer" | "string";

/** Declared kind of a tool's return value; drives how the result is rendered. */
export type ReturnKind = "integer" | "float" | "number" | "string" | "boolean";

export interface ToolSignature {
  /** Positional parameters, in order. */
  parameters: ParameterKind[];
  /** Kind of any further (variadic) arguments; omit for a fixed arity. */
  rest?: ParameterKind;
  returns: ReturnKind;
}

/** What callers hand to `register`. */
export interface ToolDefinition {
  /** Bare identifier the model uses in `TOOL_CALL: name(...)`. */
  name: string;
  /** One-line description shown to the model in the catalog. */
  description: string;
  signature: ToolSignature;
  /** Pure implementation; throw to report a domain error. */
  execute(...args: ToolArgument[]): ToolOutput;
}

/** A registered tool. Frozen at registration. */
export interface ToolSpec extends Readonly<ToolDefinition> {
  /** JSON Schema for the coerced argument array, derived from `signature`. */
  readonly parameters: JsonSchema;
}

export interface CatalogEntry {
  name: string;
  description: string;
}

/** Read side of the registry; this is all the dispatcher and session see. */
export interface ReadonlyToolRegistry {
  lookup(name: string): ToolSpec | undefined;
  /** Registration order; rendered verbatim into the tool list of the prompt. */
  catalog(): CatalogEntry[];
  list(): ToolSpec[];
}

export interface ToolRegistry extends ReadonlyToolRegistry {
  /** Throws DuplicateNameError if the name is taken. */
  register(tool: ToolDefinition): ToolSpec;
}

/** One `TOOL_CALL:` occurrence, arguments still raw text. */
export interface ToolInvocationRequest {
  name: string;
  rawArguments: string[];
  /** Index of the `TOOL_CALL:` directive in the scanned text. */
  offset: number;
}

export type ToolCallError = UnknownToolError | ToolExecutionError;

export type ToolResult =
  | {
      request: ToolInvocationRequest;
      success: true;
      value: ToolOutput;
      returns: ReturnKind;
    }
  | {
      request: ToolInvocationRequest;
      success: false;
      error: ToolCallError;
    };
