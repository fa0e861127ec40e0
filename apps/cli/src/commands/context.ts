import { InvalidArgumentError } from "commander";
import { loadConfig, requireApiKey } from "@callgate/config";
import type { CallgateConfig } from "@callgate/config";
import { isCallgateError } from "@callgate/shared";
import { TestRunsClient } from "@callgate/sdk";
import { createLogger } from "../logger.js";
import type { Logger } from "../logger.js";

export interface GlobalOptions {
  verbose?: boolean;
}

export interface CommandContext {
  config: CallgateConfig;
  logger: Logger;
}

export function createContext(options: GlobalOptions, env: NodeJS.ProcessEnv = process.env): CommandContext {
  const config = loadConfig(env);
  const logger = createLogger(options.verbose ? "debug" : config.logLevel);
  return { config, logger };
}

export function createClient(config: CallgateConfig): TestRunsClient {
  return new TestRunsClient({ apiKey: requireApiKey(config), baseUrl: config.apiBaseUrl });
}

/** Logs a failure the way every command reports it and returns the exit code. */
export function reportFailure(logger: Logger, err: unknown): number {
  if (isCallgateError(err)) {
    logger.error(`✗ ${err.message} (${err.code})`);
  } else if (err instanceof Error) {
    logger.error(`✗ ${err.message}`);
    if (err.stack) logger.debug(err.stack);
  } else {
    logger.error(`✗ ${String(err)}`);
  }
  return 1;
}

export function parseSeconds(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive number of seconds.");
  }
  return parsed;
}

export function parseRate(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw new InvalidArgumentError("Must be a number between 0 and 1.");
  }
  return parsed;
}
