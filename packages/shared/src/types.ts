import type { FAILURE_RUN_STATUSES, SUCCESS_RUN_STATUSES } from "./constants.js";

export type SuccessRunStatus = (typeof SUCCESS_RUN_STATUSES)[number];
export type FailureRunStatus = (typeof FAILURE_RUN_STATUSES)[number];
export type TerminalRunStatus = SuccessRunStatus | FailureRunStatus;

// The service may introduce statuses we don't know about; those are polled through.
export type RunStatus =
  | "CREATED"
  | "RUNNING"
  | "SCORING"
  | TerminalRunStatus
  | (string & {});

// ============================================================
// Test run creation
// ============================================================

export interface TestConfiguration {
  testCaseId: string;
  personaOverride?: string;
  scenarioOverride?: string;
}

export type TestSelection =
  | { kind: "tags"; tagIds: string[] }
  | { kind: "testCases"; testConfigurations: TestConfiguration[] };

export interface TestRunRequest {
  agentId: string;
  phoneNumbers: string[];
  selection: TestSelection;
}

export interface TestCaseRun {
  id: string;
  testCaseId?: string;
  status?: string;
}

export interface TestRunResponse {
  testRunId: string;
  resultsUrl: string;
  status: RunStatus;
  testCaseRuns?: TestCaseRun[];
}

export interface TestRunStatusResponse {
  status: RunStatus;
}

// ============================================================
// Results
// ============================================================

export interface AssertionResult {
  assertionName: string;
  status: string;
  reason?: string;
}

export interface CallResult {
  id: string;
  status: string;
  phoneNumber: string;
  testCaseId: string;
  scores: Record<string, number>;
  transcript?: string;
  durationMs?: number;
  assertionResults?: AssertionResult[];
}

export interface AssertionCategory {
  name: string;
  score: number;
}

export interface AssertionSummary {
  /** Aggregate 0-1 score across every configured assertion. */
  overallScore: number;
  categories?: AssertionCategory[];
}

export interface TestRunResults {
  id: string;
  status: RunStatus;
  calls: CallResult[];
  summary: {
    assertions: AssertionSummary;
  };
}

// ============================================================
// Threshold check
// ============================================================

export interface CheckThresholds {
  minTestPassRate: number;
  minAssertionPassRate: number;
}

export interface CheckReport {
  runId: string;
  status: RunStatus;
  statusOk: boolean;
  totalCalls: number;
  passedCalls: number;
  testPassRate: number;
  testPassRateOk: boolean;
  assertionScore: number;
  assertionsSkipped: boolean;
  assertionScoreOk: boolean;
  failingTestCaseIds: string[];
  thresholds: CheckThresholds;
  passed: boolean;
}
