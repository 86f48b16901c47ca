import { describe, expect, it } from "vitest";

import { coerceArgument, coerceArguments } from "../coerce.js";

describe("coerceArgument", () => {
  it.each([
    ["18", { kind: "integer", value: 18 }],
    [" 7 ", { kind: "integer", value: 7 }],
    ["-42", { kind: "integer", value: -42 }],
    ["3.14", { kind: "float", value: 3.14 }],
    ["-0.5", { kind: "float", value: -0.5 }],
    [".5", { kind: "float", value: 0.5 }],
    ["3.", { kind: "float", value: 3 }],
    ["1e3", { kind: "float", value: 1000 }],
    ["hello", { kind: "string", value: "hello" }],
    ["  Multimodality ", { kind: "string", value: "Multimodality" }],
    ["+5", { kind: "string", value: "+5" }],
    ["12abc", { kind: "string", value: "12abc" }],
    ["", { kind: "string", value: "" }],
  ])("coerces %j", (raw, expected) => {
    expect(coerceArgument(raw)).toEqual(expected);
  });

  it("keeps quoted tokens as text without the quotes", () => {
    expect(coerceArgument("'Multimodality'")).toEqual({
      kind: "string",
      value: "Multimodality",
    });
    expect(coerceArgument('"18"')).toEqual({ kind: "string", value: "18" });
    expect(coerceArgument("'unbalanced\"")).toEqual({
      kind: "string",
      value: "'unbalanced\"",
    });
  });

  it("keeps integers past 2^53 as text instead of rounding them", () => {
    expect(coerceArgument("9007199254740993")).toEqual({
      kind: "string",
      value: "9007199254740993",
      outOfRange: true,
    });
    expect(coerceArgument("9007199254740991")).toEqual({
      kind: "integer",
      value: 9007199254740991,
    });
  });

  it("keeps overflowing floats as text instead of Infinity", () => {
    expect(coerceArgument("1e400")).toEqual({
      kind: "string",
      value: "1e400",
      outOfRange: true,
    });
  });

  it("is deterministic across repeated calls", () => {
    expect(coerceArguments(["1", "2.5", "x"])).toEqual(
      coerceArguments(["1", "2.5", "x"])
    );
  });
});
