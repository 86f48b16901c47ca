import type { ToolDefinition } from "../types.js";

const MAX_FACTORIAL_INPUT = 1000;

function factorial(n: number): number | bigint {
  let result = 1n;
  for (let i = 2n; i <= BigInt(n); i++) {
    result *= i;
  }
  return result <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(result) : result;
}

function isPrime(n: number): boolean {
  if (n < 2) {
    return false;
  }
  for (let i = 2; i * i <= n; i++) {
    if (n % i === 0) {
      return false;
    }
  }
  return true;
}

export const averageTool: ToolDefinition = {
  name: "average",
  description: "Calculate the average of the given numbers.",
  signature: { parameters: [], rest: "number", returns: "float" },
  execute(...numbers: number[]) {
    if (numbers.length === 0) {
      return 0;
    }
    return numbers.reduce((sum, n) => sum + n, 0) / numbers.length;
  },
};

export const squareRootTool: ToolDefinition = {
  name: "square_root",
  description: "Calculate the square root of a number.",
  signature: { parameters: ["number"], returns: "float" },
  execute(n: number) {
    if (n < 0) {
      throw new RangeError("cannot take the square root of a negative number");
    }
    return Math.sqrt(n);
  },
};

export const sumTool: ToolDefinition = {
  name: "sum",
  description: "Calculate the sum of the given numbers.",
  signature: { parameters: [], rest: "number", returns: "number" },
  execute(...numbers: number[]) {
    return numbers.reduce((sum, n) => sum + n, 0);
  },
};

export const productTool: ToolDefinition = {
  name: "product",
  description: "Calculate the product of the given numbers.",
  signature: { parameters: [], rest: "number", returns: "number" },
  execute(...numbers: number[]) {
    if (numbers.length === 0) {
      return 0;
    }
    return numbers.reduce((product, n) => product * n, 1);
  },
};

export const powerTool: ToolDefinition = {
  name: "power",
  description: "Calculate base raised to the power of exponent: power(base, exponent).",
  signature: { parameters: ["number", "number"], returns: "number" },
  execute(base: number, exponent: number) {
    return Math.pow(base, exponent);
  },
};

export const factorialTool: ToolDefinition = {
  name: "factorial",
  description: "Calculate the factorial of a non-negative integer.",
  signature: { parameters: ["integer"], returns: "integer" },
  execute(n: number) {
    if (n < 0) {
      throw new RangeError("factorial is not defined for negative numbers");
    }
    if (n > MAX_FACTORIAL_INPUT) {
      throw new RangeError(`factorial input must be at most ${MAX_FACTORIAL_INPUT}`);
    }
    return factorial(n);
  },
};

export const isPrimeTool: ToolDefinition = {
  name: "is_prime",
  description: "Check whether an integer is prime.",
  signature: { parameters: ["integer"], returns: "boolean" },
  execute(n: number) {
    return isPrime(n);
  },
};

export const percentageTool: ToolDefinition = {
  name: "percentage",
  description: "Calculate what percentage part is of whole: percentage(part, whole).",
  signature: { parameters: ["number", "number"], returns: "float" },
  execute(part: number, whole: number) {
    if (whole === 0) {
      return 0;
    }
    return (part / whole) * 100;
  },
};

export const MATH_TOOLS: readonly ToolDefinition[] = [
  averageTool,
  squareRootTool,
  sumTool,
  productTool,
  powerTool,
  factorialTool,
  isPrimeTool,
  percentageTool,
];
