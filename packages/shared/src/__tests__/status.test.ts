import { describe, it, expect } from "vitest";
import { isFailureStatus, isSuccessStatus, isTerminalStatus } from "../status.js";
import { RunFailedError, ValidationError, isCallgateError } from "../errors.js";

describe("run status helpers", () => {
  it("classifies terminal statuses", () => {
    expect(isSuccessStatus("FINISHED")).toBe(true);
    expect(isSuccessStatus("COMPLETED")).toBe(true);
    expect(isFailureStatus("FAILED")).toBe(true);
    expect(isFailureStatus("SCORING_FAILED")).toBe(true);
    expect(isFailureStatus("CANCELED")).toBe(true);
  });

  it("treats in-flight and unknown statuses as non-terminal", () => {
    for (const status of ["CREATED", "RUNNING", "SCORING", "QUEUED_SOMEWHERE"]) {
      expect(isTerminalStatus(status)).toBe(false);
    }
  });
});

describe("errors", () => {
  it("carries a code and narrows with isCallgateError", () => {
    const err: unknown = new RunFailedError("run-1", "FAILED");
    expect(isCallgateError(err)).toBe(true);
    if (isCallgateError(err)) {
      expect(err.code).toBe("run_failed");
      expect(err.message).toBe("Test run run-1 ended with status FAILED");
    }
    expect(isCallgateError(new Error("plain"))).toBe(false);
  });

  it("keeps subclass identity", () => {
    const err = new ValidationError("bad input", ["a: required"]);
    expect(err).toBeInstanceOf(ValidationError);
    expect(err.name).toBe("ValidationError");
    expect(err.issues).toEqual(["a: required"]);
  });
});
