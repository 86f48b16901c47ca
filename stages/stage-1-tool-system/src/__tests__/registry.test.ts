import { describe, expect, it } from "vitest";

import { DuplicateNameError, InvalidToolNameError } from "../errors.js";
import { createToolRegistry, signatureToSchema } from "../registry.js";
import { BUILTIN_TOOLS, createBuiltinToolRegistry } from "../tools/index.js";
import type { ToolDefinition } from "../types.js";

const double: ToolDefinition = {
  name: "double",
  description: "Double a number.",
  signature: { parameters: ["number"], returns: "number" },
  execute(n: number) {
    return n * 2;
  },
};

const shout: ToolDefinition = {
  name: "shout",
  description: "Upper-case a string.",
  signature: { parameters: ["string"], returns: "string" },
  execute(text: string) {
    return text.toUpperCase();
  },
};

describe("createToolRegistry", () => {
  it("returns the same callable on lookup after registration", () => {
    const registry = createToolRegistry();
    registry.register(double);

    const spec = registry.lookup("double");
    expect(spec?.execute).toBe(double.execute);
    expect(spec?.description).toBe("Double a number.");
  });

  it("returns undefined for unknown names", () => {
    expect(createToolRegistry().lookup("missing")).toBeUndefined();
  });

  it("rejects a second registration under the same name", () => {
    const registry = createToolRegistry();
    registry.register(double);

    expect(() => registry.register({ ...shout, name: "double" })).toThrow(
      DuplicateNameError
    );
    expect(registry.lookup("double")?.execute).toBe(double.execute);
  });

  it("rejects names that are not bare identifiers", () => {
    const registry = createToolRegistry();
    expect(() => registry.register({ ...double, name: "web.search" })).toThrow(
      InvalidToolNameError
    );
    expect(() => registry.register({ ...double, name: "" })).toThrow(
      InvalidToolNameError
    );
  });

  it("lists the catalog in registration order", () => {
    const registry = createToolRegistry();
    registry.register(shout);
    registry.register(double);

    expect(registry.catalog()).toEqual([
      { name: "shout", description: "Upper-case a string." },
      { name: "double", description: "Double a number." },
    ]);
    expect(registry.list().map((t) => t.name)).toEqual(["shout", "double"]);
  });

  it("freezes registered specs", () => {
    const registry = createToolRegistry();
    const spec = registry.register(double);
    expect(Object.isFrozen(spec)).toBe(true);
  });
});

describe("signatureToSchema", () => {
  it("describes fixed, variadic and empty signatures", () => {
    expect(
      signatureToSchema({ parameters: ["number", "string"], returns: "number" })
    ).toEqual({
      type: "array",
      items: [{ type: "number" }, { type: "string" }],
      minItems: 2,
      additionalItems: false,
    });
    expect(
      signatureToSchema({ parameters: [], rest: "number", returns: "float" })
    ).toEqual({ type: "array", items: { type: "number" } });
    expect(signatureToSchema({ parameters: [], returns: "string" })).toEqual({
      type: "array",
      maxItems: 0,
    });
  });
});

describe("createBuiltinToolRegistry", () => {
  it("registers every built-in tool once", () => {
    const registry = createBuiltinToolRegistry();
    expect(registry.list()).toHaveLength(BUILTIN_TOOLS.length);
    expect(registry.catalog().slice(0, 3).map((e) => e.name)).toEqual([
      "average",
      "square_root",
      "sum",
    ]);
    expect(registry.lookup("count_vowels")).toBeDefined();
  });

  it("appends extra tools after the built-ins", () => {
    const registry = createBuiltinToolRegistry([double]);
    const names = registry.catalog().map((e) => e.name);
    expect(names[names.length - 1]).toBe("double");
  });
});
