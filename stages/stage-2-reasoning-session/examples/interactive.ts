/**
 * Interactive reasoning shell: reads a query per line, runs one session,
 * prints the answer and optionally the tool rounds behind it.
 */

import { createInterface } from "node:readline/promises";
import { stdin as input, stdout as output } from "node:process";

import {
  buildGatewayConfig,
  ConfigError,
  loadConfig,
} from "../../../config/index.js";
import {
  createConsoleLogger,
  createGatewayModelClient,
  createModelGateway,
} from "../../stage-0-model-gateway/src/index.js";
import {
  createBuiltinToolRegistry,
  formatToolResult,
} from "../../stage-1-tool-system/src/index.js";
import {
  createConsoleSessionLogger,
  createReasoner,
  runShellQuery,
  type ReasoningResult,
} from "../src/index.js";

const EXAMPLE_QUERIES = [
  "What is the average of 18 and 50?",
  'How many vowels are in the word "Multimodality"?',
  "Which is larger, 15 factorial or 10 factorial, and by how much?",
  'Is "racecar" a palindrome, and how many letters does it have?',
];

const EXIT_COMMANDS = new Set(["quit", "exit", "q"]);

function printBreakdown(result: ReasoningResult) {
  console.log("\n---------- Breakdown ----------");
  console.log(`session: ${result.sessionId}  state: ${result.state}`);
  for (const round of result.rounds) {
    console.log(`round ${round.round}:`);
    for (const r of round.results) {
      console.log(`  ${formatToolResult(r)}`);
    }
  }
  if (result.rounds.length === 0) {
    console.log("no tools were used");
  }
  if (result.maxRoundsReached) {
    console.log("stopped at the tool round limit");
  }
  console.log("-------------------------------\n");
}

async function main() {
  let config;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      process.exitCode = 1;
      return;
    }
    throw err;
  }

  const gateway = createModelGateway(
    buildGatewayConfig(config, createConsoleLogger(config.logLevel))
  );
  const model = createGatewayModelClient(gateway, {
    temperature: config.temperature,
    maxTokens: config.maxTokens,
  });
  const reasoner = createReasoner(
    {
      model,
      registry: createBuiltinToolRegistry(),
      logger: createConsoleSessionLogger(config.logLevel),
    },
    {
      maxToolRounds: config.maxToolRounds,
      initialMaxTokens: config.maxTokens,
      followUpMaxTokens: config.followUpMaxTokens,
    }
  );

  console.log("Tool-augmented reasoning shell. Type quit, exit or q to leave.");
  console.log("Try:");
  for (const q of EXAMPLE_QUERIES) {
    console.log(`  - ${q}`);
  }

  const rl = createInterface({ input, output });
  try {
    for (;;) {
      const query = (await rl.question("\n> ")).trim();
      if (query === "") {
        continue;
      }
      if (EXIT_COMMANDS.has(query.toLowerCase())) {
        break;
      }

      const reply = await runShellQuery(reasoner, query);
      if (!reply.ok) {
        console.error(reply.message);
        continue;
      }
      console.log(`\n${reply.answer}`);

      const more = (await rl.question("Show breakdown? (y/N) ")).trim();
      if (more.toLowerCase() === "y") {
        printBreakdown(reply.result);
      }
    }
  } finally {
    rl.close();
  }
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
