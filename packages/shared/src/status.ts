import { FAILURE_RUN_STATUSES, SUCCESS_RUN_STATUSES } from "./constants.js";
import type { FailureRunStatus, RunStatus, SuccessRunStatus } from "./types.js";

const SUCCESS: ReadonlySet<string> = new Set(SUCCESS_RUN_STATUSES);
const FAILURE: ReadonlySet<string> = new Set(FAILURE_RUN_STATUSES);

export function isSuccessStatus(status: RunStatus): status is SuccessRunStatus {
  return SUCCESS.has(status);
}

export function isFailureStatus(status: RunStatus): status is FailureRunStatus {
  return FAILURE.has(status);
}

export function isTerminalStatus(status: RunStatus): boolean {
  return isSuccessStatus(status) || isFailureStatus(status);
}
