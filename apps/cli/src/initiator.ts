import { TestRunRequestSchema, ValidationError } from "@callgate/shared";
import type { TestConfiguration, TestRunRequest, TestSelection } from "@callgate/shared";
import { getTestRunUrl } from "@callgate/sdk";
import type { TestRunsClient } from "@callgate/sdk";
import type { Logger } from "./logger.js";
import { silentLogger } from "./logger.js";

export interface TestRunInput {
  agentId: string;
  phoneNumbers: string[];
  tagIds?: string[];
  testCaseIds?: string[];
  personaOverride?: string;
  scenarioOverride?: string;
}

export interface CreatedTestRun {
  testRunId: string;
  resultsUrl: string;
  testRunUrl: string;
  /** Number of test case runs the service queued, when it reports them */
  queued?: number;
}

function buildSelection(input: TestRunInput): TestSelection {
  const tagIds = input.tagIds ?? [];
  const testCaseIds = input.testCaseIds ?? [];

  if (tagIds.length > 0 && testCaseIds.length > 0) {
    throw new ValidationError("Cannot specify both tag ids and test case ids. Choose one selection method.");
  }
  if (tagIds.length === 0 && testCaseIds.length === 0) {
    throw new ValidationError("Must specify either tag ids or test case ids for test selection.");
  }

  if (tagIds.length > 0) {
    return { kind: "tags", tagIds };
  }

  const testConfigurations = testCaseIds.map((testCaseId): TestConfiguration => {
    const config: TestConfiguration = { testCaseId };
    if (input.personaOverride) config.personaOverride = input.personaOverride;
    if (input.scenarioOverride) config.scenarioOverride = input.scenarioOverride;
    return config;
  });
  return { kind: "testCases", testConfigurations };
}

export function buildTestRunRequest(input: TestRunInput): TestRunRequest {
  const selection = buildSelection(input);
  const phoneNumbers = [
    ...new Set(input.phoneNumbers.map((n) => n.trim()).filter((n) => n.length > 0)),
  ];

  const parsed = TestRunRequestSchema.safeParse({
    agentId: input.agentId,
    phoneNumbers,
    selection,
  });
  if (!parsed.success) {
    throw ValidationError.fromZod("Invalid test run request", parsed.error);
  }
  return parsed.data;
}

export async function createTestRun(
  client: Pick<TestRunsClient, "createTestRun">,
  input: TestRunInput,
  opts: { uiBaseUrl: string; logger?: Logger }
): Promise<CreatedTestRun> {
  const log = opts.logger ?? silentLogger;
  const request = buildTestRunRequest(input);

  if (request.selection.kind === "tags") {
    log.info(`Running tests with tags: ${request.selection.tagIds.join(", ")}`);
  } else {
    const ids = request.selection.testConfigurations.map((c) => c.testCaseId);
    log.info(`Running specific test cases: ${ids.join(", ")}`);
  }
  log.info(`Creating test run for agent ${request.agentId}`);
  log.debug(`phone numbers: ${request.phoneNumbers.join(", ")}`);

  const response = await client.createTestRun(request);

  if (response.testCaseRuns !== undefined && response.testCaseRuns.length === 0) {
    throw new ValidationError(
      `No test cases matched the selection for agent ${request.agentId} (run ${response.testRunId}). ` +
        "Check that the agent has test cases with the given tags or ids."
    );
  }

  return {
    testRunId: response.testRunId,
    resultsUrl: response.resultsUrl,
    testRunUrl: getTestRunUrl(opts.uiBaseUrl, response.testRunId),
    queued: response.testCaseRuns?.length,
  };
}
