/**
 * Tool Dispatcher: resolve, coerce, check, execute. Never throws for a single
 * bad call; every request yields exactly one ToolResult, in request order.
 */

import { coerceArguments } from "./coerce.js";
import { ToolExecutionError, UnknownToolError } from "./errors.js";
import { compileValidator, type Validator } from "./validate.js";
import type {
  ParameterKind,
  ReadonlyToolRegistry,
  ReturnKind,
  ToolInvocationRequest,
  ToolOutput,
  ToolResult,
  ToolSpec,
  TypedValue,
} from "./types.js";

const validators = new WeakMap<ToolSpec, Validator>();

function argumentLabel(instancePath: string): string {
  const index = Number(instancePath.slice(1));
  return Number.isInteger(index) && instancePath !== ""
    ? `argument ${index + 1}`
    : "arguments";
}

function validatorFor(spec: ToolSpec): Validator {
  let validate = validators.get(spec);
  if (!validate) {
    validate = compileValidator(spec.parameters, argumentLabel);
    validators.set(spec, validate);
  }
  return validate;
}

function plural(n: number): string {
  return n === 1 ? "argument" : "arguments";
}

function checkArity(spec: ToolSpec, given: number): string | undefined {
  const declared = spec.signature.parameters.length;
  if (spec.signature.rest !== undefined) {
    return given < declared
      ? `expected at least ${declared} ${plural(declared)}, got ${given}`
      : undefined;
  }
  return given !== declared
    ? `expected ${declared} ${plural(declared)}, got ${given}`
    : undefined;
}

function parameterKind(spec: ToolSpec, index: number): ParameterKind | undefined {
  return spec.signature.parameters[index] ?? spec.signature.rest;
}

// A numeric literal too large for a JS number must not reach a numeric parameter.
function checkRange(spec: ToolSpec, args: readonly TypedValue[]): string | undefined {
  const index = args.findIndex(
    (arg, i) =>
      arg.kind === "string" &&
      arg.outOfRange === true &&
      parameterKind(spec, i) !== "string"
  );
  return index === -1 ? undefined : `argument ${index + 1} is out of range`;
}

function invoke(spec: ToolSpec, request: ToolInvocationRequest): ToolResult {
  const args = coerceArguments(request.rawArguments);
  const values = args.map((v) => v.value);

  const problem = checkArity(spec, values.length) ?? checkRange(spec, args);
  if (problem) {
    return {
      request,
      success: false,
      error: new ToolExecutionError(spec.name, problem),
    };
  }

  const validation = validatorFor(spec)(values);
  if (!validation.valid) {
    return {
      request,
      success: false,
      error: new ToolExecutionError(
        spec.name,
        (validation.errors ?? ["invalid arguments"]).join("; ")
      ),
    };
  }

  let value: ToolOutput;
  try {
    value = spec.execute(...values);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return {
      request,
      success: false,
      error: new ToolExecutionError(spec.name, message, { cause: err }),
    };
  }

  if (typeof value === "number" && !Number.isFinite(value)) {
    return {
      request,
      success: false,
      error: new ToolExecutionError(spec.name, "result is not a finite number"),
    };
  }

  return { request, success: true, value, returns: spec.signature.returns };
}

export function dispatchToolCall(
  registry: ReadonlyToolRegistry,
  request: ToolInvocationRequest
): ToolResult {
  const spec = registry.lookup(request.name);
  if (!spec) {
    return {
      request,
      success: false,
      error: new UnknownToolError(request.name),
    };
  }
  return invoke(spec, request);
}

/** Sequential; results come back in the order of `requests`. */
export function dispatchToolCalls(
  registry: ReadonlyToolRegistry,
  requests: readonly ToolInvocationRequest[]
): ToolResult[] {
  return requests.map((request) => dispatchToolCall(registry, request));
}

export function formatToolValue(value: ToolOutput, returns: ReturnKind): string {
  if (typeof value === "number" && returns === "float" && Number.isInteger(value)) {
    return value.toFixed(1);
  }
  return String(value);
}

/** `name(a, b) = value` or `name(a, b) -> error: cause`. */
export function formatToolResult(result: ToolResult): string {
  const call = `${result.request.name}(${result.request.rawArguments.join(", ")})`;
  if (result.success) {
    return `${call} = ${formatToolValue(result.value, result.returns)}`;
  }
  return `${call} -> error: ${result.error.message}`;
}
