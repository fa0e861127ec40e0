import {
  CALL_PASSED_STATUS,
  DEFAULT_MIN_ASSERTION_PASS_RATE,
  DEFAULT_MIN_TEST_PASS_RATE,
  ValidationError,
  isSuccessStatus,
} from "@callgate/shared";
import type { AssertionSummary, CheckReport, CheckThresholds, TestRunResults } from "@callgate/shared";

export function validateThresholds(thresholds: Partial<CheckThresholds>): CheckThresholds {
  const resolved: CheckThresholds = {
    minTestPassRate: thresholds.minTestPassRate ?? DEFAULT_MIN_TEST_PASS_RATE,
    minAssertionPassRate: thresholds.minAssertionPassRate ?? DEFAULT_MIN_ASSERTION_PASS_RATE,
  };
  const issues: string[] = [];
  for (const [name, value] of Object.entries(resolved)) {
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      issues.push(`${name} must be between 0 and 1, got ${value}`);
    }
  }
  if (issues.length > 0) {
    throw new ValidationError(`Invalid thresholds: ${issues.join("; ")}`, issues);
  }
  return resolved;
}

/** A zero score with no categories means the run had no assertions configured. */
export function assertionsConfigured(assertions: AssertionSummary): boolean {
  return assertions.overallScore !== 0 || (assertions.categories?.length ?? 0) > 0;
}

export function evaluateResults(
  results: TestRunResults,
  thresholds: Partial<CheckThresholds> = {}
): CheckReport {
  const resolved = validateThresholds(thresholds);

  const totalCalls = results.calls.length;
  const failing = results.calls.filter((c) => c.status !== CALL_PASSED_STATUS);
  const passedCalls = totalCalls - failing.length;
  const testPassRate = totalCalls === 0 ? 0 : passedCalls / totalCalls;
  const testPassRateOk = totalCalls > 0 && testPassRate >= resolved.minTestPassRate;

  const { assertions } = results.summary;
  const assertionsSkipped = !assertionsConfigured(assertions);
  const assertionScoreOk =
    assertionsSkipped || assertions.overallScore >= resolved.minAssertionPassRate;

  const statusOk = isSuccessStatus(results.status);

  return {
    runId: results.id,
    status: results.status,
    statusOk,
    totalCalls,
    passedCalls,
    testPassRate,
    testPassRateOk,
    assertionScore: assertions.overallScore,
    assertionsSkipped,
    assertionScoreOk,
    failingTestCaseIds: failing.map((c) => c.testCaseId),
    thresholds: resolved,
    passed: statusOk && testPassRateOk && assertionScoreOk,
  };
}
