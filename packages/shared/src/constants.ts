export const RUN_STATUSES = [
  "CREATED",
  "RUNNING",
  "SCORING",
  "SCORING_FAILED",
  "FINISHED",
  "COMPLETED",
  "FAILED",
  "CANCELED",
] as const;
export const SUCCESS_RUN_STATUSES = ["FINISHED", "COMPLETED"] as const;
export const FAILURE_RUN_STATUSES = ["FAILED", "SCORING_FAILED", "CANCELED"] as const;

export const CALL_PASSED_STATUS = "PASSED";

export const DEFAULT_API_BASE_URL = "https://app.hamming.ai/api/rest";
export const DEFAULT_UI_BASE_URL = "https://app.hamming.ai";

export const DEFAULT_POLL_INTERVAL_MS = 10_000;
export const DEFAULT_TIMEOUT_MS = 600_000; // 10 minutes
export const DEFAULT_MIN_TEST_PASS_RATE = 1.0;
export const DEFAULT_MIN_ASSERTION_PASS_RATE = 1.0;

export const E164_PATTERN = /^\+[1-9]\d{1,14}$/;
