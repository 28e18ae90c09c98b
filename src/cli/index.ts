#!/usr/bin/env node
/**
 * src/cli/index.ts
 * CLI entry (commander): llm-gateway <prompt> [--model NAME] [--json]
 */

import "dotenv/config";
import { Command } from "commander";
import { LEGACY_MODEL_PLACEHOLDER, loadConfig } from "../core/config";
import { toError } from "../core/errors";
import { createGatewayContext } from "../core/gateway";
import { GatewayLogger } from "../core/logger";

export const INTERRUPTED_EXIT_CODE = 130;

export type Respond = (model: string, prompt: string) => Promise<string>;

export interface CliOptions {
  // Defaults to a gateway built from the environment
  respond?: Respond;
  write?: (text: string) => void;
}

interface CliSession {
  respond: Respond;
  logger?: GatewayLogger;
}

interface AskOptions {
  model: string;
  json?: boolean;
}

export function formatAnswer(answer: string, json: boolean): string {
  return json ? JSON.stringify({ response: answer }) : answer;
}

function gatewayFromEnv(): CliSession {
  const config = loadConfig();
  const logger = new GatewayLogger({
    // The answer goes to stdout, so logs go to stderr and stay quiet unless asked
    level: process.env.LOG_LEVEL ? config.logLevel : "warn",
    format: config.logFormat,
    destination: "stderr",
    source: "cli",
  });
  const { gateway } = createGatewayContext(config, { logger });
  return { respond: (model, prompt) => gateway.respond(model, prompt), logger };
}

export function createCli(options: CliOptions = {}): Command {
  const write = options.write ?? ((text: string) => process.stdout.write(`${text}\n`));
  const program = new Command();

  program
    .name("llm-gateway")
    .description("Query the running Ollama LLM")
    .version("0.2.0")
    .argument("<prompt>", "Prompt to send to the model")
    .option("--model <name>", "Model identifier", LEGACY_MODEL_PLACEHOLDER)
    .option("--json", "Output response as JSON for scripting purposes")
    .action(async (prompt: string, opts: AskOptions) => {
      const session: CliSession = options.respond ? { respond: options.respond } : gatewayFromEnv();
      const answer = await session.respond(opts.model, prompt);
      write(formatAnswer(answer, opts.json === true));
      await session.logger?.flush();
    });

  return program;
}

export async function runCli(argv: string[] = process.argv, options: CliOptions = {}): Promise<void> {
  process.once("SIGINT", () => {
    process.stderr.write("\nInterrupted\n");
    process.exit(INTERRUPTED_EXIT_CODE);
  });
  await createCli(options).parseAsync(argv);
}

if (require.main === module) {
  runCli().catch((error: unknown) => {
    console.error(toError(error).message);
    process.exit(1);
  });
}
