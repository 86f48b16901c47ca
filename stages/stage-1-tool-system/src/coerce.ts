import type { TypedValue } from "./types.js";

const INTEGER_LITERAL = /^-?\d+$/;
const FLOAT_LITERAL = /^-?(?:\d+\.\d*|\.\d+|\d+)(?:[eE][-+]?\d+)?$/;

function unquote(token: string): string | undefined {
  if (token.length < 2) {
    return undefined;
  }
  const first = token[0];
  if ((first === '"' || first === "'") && token[token.length - 1] === first) {
    return token.slice(1, -1);
  }
  return undefined;
}

/**
 * Raw argument text -> typed scalar. Total: every token yields a value.
 * A quoted token is always text; otherwise integer, then float, then text.
 * Integers past 2^53 and floats that overflow stay text, flagged `outOfRange`.
 */
export function coerceArgument(raw: string): TypedValue {
  const token = raw.trim();

  const quoted = unquote(token);
  if (quoted !== undefined) {
    return { kind: "string", value: quoted };
  }
  if (INTEGER_LITERAL.test(token)) {
    const value = Number.parseInt(token, 10);
    return Number.isSafeInteger(value)
      ? { kind: "integer", value }
      : { kind: "string", value: token, outOfRange: true };
  }
  if (FLOAT_LITERAL.test(token)) {
    const value = Number.parseFloat(token);
    return Number.isFinite(value)
      ? { kind: "float", value }
      : { kind: "string", value: token, outOfRange: true };
  }
  return { kind: "string", value: token };
}

export function coerceArguments(rawArguments: readonly string[]): TypedValue[] {
  return rawArguments.map(coerceArgument);
}
