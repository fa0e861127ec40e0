export function getTestRunUrl(uiBaseUrl: string, testRunId: string): string {
  return `${uiBaseUrl.replace(/\/+$/, "")}/test-runs/${encodeURIComponent(testRunId)}`;
}

export function getTestCaseUrl(uiBaseUrl: string, testCaseId: string): string {
  return `${uiBaseUrl.replace(/\/+$/, "")}/test-cases/${encodeURIComponent(testCaseId)}`;
}
