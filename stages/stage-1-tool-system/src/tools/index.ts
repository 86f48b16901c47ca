import { createToolRegistry } from "../registry.js";
import type { ToolDefinition, ToolRegistry } from "../types.js";
import { MATH_TOOLS } from "./math.js";
import { STRING_TOOLS } from "./string.js";

export { MATH_TOOLS } from "./math.js";
export { STRING_TOOLS } from "./string.js";

export const BUILTIN_TOOLS: readonly ToolDefinition[] = [
  ...MATH_TOOLS,
  ...STRING_TOOLS,
];

/** Registry with every built-in tool, plus any extra definitions after them. */
export function createBuiltinToolRegistry(
  extra: readonly ToolDefinition[] = []
): ToolRegistry {
  const registry = createToolRegistry();
  for (const tool of [...BUILTIN_TOOLS, ...extra]) {
    registry.register(tool);
  }
  return registry;
}
