/**
 * Tool Registry: built once at start-up, then only read.
 */

import { DuplicateNameError, InvalidToolNameError } from "./errors.js";
import type {
  CatalogEntry,
  JsonSchema,
  ParameterKind,
  ToolDefinition,
  ToolRegistry,
  ToolSignature,
  ToolSpec,
} from "./types.js";

export const TOOL_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

function kindSchema(kind: ParameterKind): JsonSchema {
  return { type: kind };
}

/** JSON Schema for the argument array a signature accepts. */
export function signatureToSchema(signature: ToolSignature): JsonSchema {
  const fixed = signature.parameters.map(kindSchema);

  if (fixed.length === 0) {
    return signature.rest
      ? { type: "array", items: kindSchema(signature.rest) }
      : { type: "array", maxItems: 0 };
  }

  return {
    type: "array",
    items: fixed,
    minItems: fixed.length,
    additionalItems: signature.rest ? kindSchema(signature.rest) : false,
  };
}

export function createToolRegistry(): ToolRegistry {
  const tools = new Map<string, ToolSpec>();

  return {
    register(tool: ToolDefinition): ToolSpec {
      if (!TOOL_NAME_PATTERN.test(tool.name)) {
        throw new InvalidToolNameError(tool.name);
      }
      if (tools.has(tool.name)) {
        throw new DuplicateNameError(tool.name);
      }
      const spec: ToolSpec = Object.freeze({
        name: tool.name,
        description: tool.description,
        signature: Object.freeze({
          ...tool.signature,
          parameters: [...tool.signature.parameters],
        }),
        parameters: signatureToSchema(tool.signature),
        execute: tool.execute,
      });
      tools.set(spec.name, spec);
      return spec;
    },

    lookup(name: string): ToolSpec | undefined {
      return tools.get(name);
    },

    catalog(): CatalogEntry[] {
      return Array.from(tools.values(), ({ name, description }) => ({
        name,
        description,
      }));
    },

    list(): ToolSpec[] {
      return Array.from(tools.values());
    },
  };
}
