import { parseCommaSeparated } from "@callgate/config";
import { ValidationError } from "@callgate/shared";
import { createTestRun } from "../initiator.js";
import { createClient, createContext, reportFailure } from "./context.js";
import type { GlobalOptions } from "./context.js";

export interface RunOptions extends GlobalOptions {
  agentId?: string;
  phoneNumbers?: string;
  tagIds?: string;
  testCaseIds?: string;
  persona?: string;
  scenario?: string;
}

export async function runCommand(options: RunOptions): Promise<number> {
  const { config, logger } = createContext(options);

  try {
    const agentId = options.agentId ?? config.agentId;
    if (!agentId) {
      throw new ValidationError("AGENT_ID is not set");
    }
    const phoneNumbers = parseCommaSeparated(options.phoneNumbers) ?? config.phoneNumbers;
    if (!phoneNumbers) {
      throw new ValidationError("PHONE_NUMBERS is not set");
    }

    // A selection given on the command line replaces the environment's entirely.
    const cliTags = parseCommaSeparated(options.tagIds);
    const cliCases = parseCommaSeparated(options.testCaseIds);
    const fromCli = cliTags !== undefined || cliCases !== undefined;

    const client = createClient(config);
    const run = await createTestRun(
      client,
      {
        agentId,
        phoneNumbers,
        tagIds: fromCli ? cliTags : config.tagIds,
        testCaseIds: fromCli ? cliCases : config.testCaseIds,
        personaOverride: options.persona ?? config.personaOverride,
        scenarioOverride: options.scenario ?? config.scenarioOverride,
      },
      { uiBaseUrl: config.uiBaseUrl, logger }
    );

    logger.info("Test run created successfully");
    logger.info(`Test Run ID: ${run.testRunId}`);
    logger.info(`Results URL: ${run.resultsUrl}`);
    logger.info(`View in UI: ${run.testRunUrl}`);
    if (run.queued !== undefined) {
      logger.info(`Test cases queued: ${run.queued}`);
    }

    // The only stdout line, so CI can capture it with $(callgate run).
    console.log(run.testRunId);
    return 0;
  } catch (err) {
    return reportFailure(logger, err);
  }
}
