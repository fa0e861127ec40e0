import { describe, it, expect, vi } from "vitest";
import { ValidationError } from "@callgate/shared";
import type { TestRunRequest, TestRunResponse } from "@callgate/shared";
import { buildTestRunRequest, createTestRun } from "../initiator.js";

function fakeClient(response: TestRunResponse) {
  const createTestRun = vi.fn(async (_request: TestRunRequest) => response);
  return { client: { createTestRun }, createTestRun };
}

describe("buildTestRunRequest", () => {
  it("builds a tag selection and deduplicates phone numbers", () => {
    const request = buildTestRunRequest({
      agentId: "agent-1",
      phoneNumbers: [" +15551234567", "+15551234567", "+442071234567"],
      tagIds: ["smoke", "billing"],
    });

    expect(request).toEqual({
      agentId: "agent-1",
      phoneNumbers: ["+15551234567", "+442071234567"],
      selection: { kind: "tags", tagIds: ["smoke", "billing"] },
    });
  });

  it("attaches persona and scenario overrides to every test case", () => {
    const request = buildTestRunRequest({
      agentId: "agent-1",
      phoneNumbers: ["+15551234567"],
      testCaseIds: ["tc-1", "tc-2"],
      personaOverride: "elderly caller",
      scenarioOverride: "wants a refund",
    });

    expect(request.selection).toEqual({
      kind: "testCases",
      testConfigurations: [
        { testCaseId: "tc-1", personaOverride: "elderly caller", scenarioOverride: "wants a refund" },
        { testCaseId: "tc-2", personaOverride: "elderly caller", scenarioOverride: "wants a refund" },
      ],
    });
  });

  it("rejects a phone number without a leading plus", () => {
    expect(() =>
      buildTestRunRequest({
        agentId: "agent-1",
        phoneNumbers: ["+15551234567", "15557654321"],
        tagIds: ["smoke"],
      })
    ).toThrow(
      new ValidationError(
        "Invalid test run request: phoneNumbers.1: Phone number must start with '+': 15557654321"
      )
    );
  });

  it("rejects both selection methods", () => {
    expect(() =>
      buildTestRunRequest({
        agentId: "agent-1",
        phoneNumbers: ["+15551234567"],
        tagIds: ["smoke"],
        testCaseIds: ["tc-1"],
      })
    ).toThrow("Cannot specify both tag ids and test case ids. Choose one selection method.");
  });

  it("rejects neither selection method", () => {
    for (const selection of [{}, { tagIds: [] }, { tagIds: [], testCaseIds: [] }]) {
      expect(() =>
        buildTestRunRequest({ agentId: "agent-1", phoneNumbers: ["+15551234567"], ...selection })
      ).toThrow(ValidationError);
    }
  });

  it("rejects an empty phone number list", () => {
    expect(() =>
      buildTestRunRequest({ agentId: "agent-1", phoneNumbers: [" "], tagIds: ["smoke"] })
    ).toThrow("Invalid test run request: phoneNumbers: At least one phone number is required");
  });
});

describe("createTestRun", () => {
  it("validates before calling the service", async () => {
    const { client, createTestRun: remote } = fakeClient({
      testRunId: "run-1",
      resultsUrl: "",
      status: "CREATED",
    });

    await expect(
      createTestRun(client, { agentId: "agent-1", phoneNumbers: ["5551234567"], tagIds: ["smoke"] }, {
        uiBaseUrl: "https://ui.test",
      })
    ).rejects.toBeInstanceOf(ValidationError);
    expect(remote).not.toHaveBeenCalled();
  });

  it("returns the run id and links", async () => {
    const { client, createTestRun: remote } = fakeClient({
      testRunId: "run-1",
      resultsUrl: "https://ui.test/test-runs/run-1/results",
      status: "CREATED",
      testCaseRuns: [{ id: "tcr-1" }, { id: "tcr-2" }],
    });

    const run = await createTestRun(
      client,
      { agentId: "agent-1", phoneNumbers: ["+15551234567"], testCaseIds: ["tc-1"] },
      { uiBaseUrl: "https://ui.test" }
    );

    expect(run).toEqual({
      testRunId: "run-1",
      resultsUrl: "https://ui.test/test-runs/run-1/results",
      testRunUrl: "https://ui.test/test-runs/run-1",
      queued: 2,
    });
    expect(remote).toHaveBeenCalledTimes(1);
  });

  it("fails when the service matched no test cases", async () => {
    const { client } = fakeClient({
      testRunId: "run-1",
      resultsUrl: "",
      status: "CREATED",
      testCaseRuns: [],
    });

    await expect(
      createTestRun(client, { agentId: "agent-1", phoneNumbers: ["+15551234567"], tagIds: ["nope"] }, {
        uiBaseUrl: "https://ui.test",
      })
    ).rejects.toThrow(/No test cases matched the selection for agent agent-1 \(run run-1\)/);
  });
});
