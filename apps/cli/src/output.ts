import chalk from "chalk";
import type { CheckReport, TestRunResults } from "@callgate/shared";
import { CALL_PASSED_STATUS } from "@callgate/shared";
import { getTestCaseUrl } from "@callgate/sdk";

const RULE = "=".repeat(60);

export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

export function formatReport(
  report: CheckReport,
  results: TestRunResults,
  uiBaseUrl: string
): string[] {
  const ok = (pass: boolean, text: string) =>
    pass ? chalk.green(`  ✓ PASS: ${text}`) : chalk.red(`  ✗ FAIL: ${text}`);
  const lines: string[] = [];

  if (!report.statusOk) {
    lines.push(chalk.red(`✗ Test run did not complete successfully. Status: ${report.status}`));
  }

  lines.push(RULE, chalk.bold("TEST CASE PASS RATE:"));
  if (report.totalCalls === 0) {
    lines.push(chalk.red("  ✗ FAIL: No test cases found in results"));
  } else {
    lines.push(
      `  Passed: ${report.passedCalls}/${report.totalCalls} (${formatPercent(report.testPassRate)})`,
      `  Threshold: ${formatPercent(report.thresholds.minTestPassRate)}`,
      ok(
        report.testPassRateOk,
        report.testPassRateOk ? "Test pass rate meets threshold" : "Test pass rate below threshold"
      )
    );
  }

  lines.push(RULE, chalk.bold("ASSERTION SCORE:"));
  if (report.assertionsSkipped) {
    lines.push(
      "  No assertions configured for these test cases",
      chalk.dim("  ✓ SKIP: Assertion check skipped")
    );
  } else {
    lines.push(
      `  Overall score: ${formatPercent(report.assertionScore)}`,
      `  Threshold: ${formatPercent(report.thresholds.minAssertionPassRate)}`
    );
    for (const category of results.summary.assertions.categories ?? []) {
      lines.push(chalk.dim(`    ${category.name}: ${formatPercent(category.score)}`));
    }
    lines.push(
      ok(
        report.assertionScoreOk,
        report.assertionScoreOk ? "Assertion score meets threshold" : "Assertion score below threshold"
      )
    );
  }

  if (results.calls.length > 0) {
    lines.push(RULE, chalk.bold("DETAILED TEST RESULTS:"));
    for (const call of results.calls) {
      const link = chalk.dim(`      View test case: ${getTestCaseUrl(uiBaseUrl, call.testCaseId)}`);
      if (call.status === CALL_PASSED_STATUS) {
        lines.push(chalk.green(`  ✓ ${call.id} (testCase: ${call.testCaseId}): PASSED`), link);
        continue;
      }
      lines.push(chalk.red(`  ✗ ${call.id} (testCase: ${call.testCaseId}): ${call.status}`), link);
      for (const assertion of call.assertionResults ?? []) {
        if (assertion.status === "FAILED") {
          lines.push(chalk.red(`      └─ ${assertion.assertionName}: ${assertion.reason ?? "no reason given"}`));
        }
      }
    }
  }

  lines.push(RULE);
  lines.push(report.passed ? chalk.green("✓ All checks PASSED") : chalk.red("✗ Some checks FAILED"));
  return lines;
}

export function printReport(report: CheckReport, results: TestRunResults, uiBaseUrl: string): void {
  for (const line of formatReport(report, results, uiBaseUrl)) {
    console.error(line);
  }
}
