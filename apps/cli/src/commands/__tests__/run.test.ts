import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { runCommand } from "../run.js";

const created = {
  testRunId: "run-42",
  resultsUrl: "https://ui.test/test-runs/run-42/results",
  status: "CREATED",
  testCaseRuns: [{ id: "tcr-1" }],
};

function stubCreate(body: unknown = created) {
  const fetchMock = vi.fn(
    async (_url: string, _init?: RequestInit) => new Response(JSON.stringify(body), { status: 200 })
  );
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function sentBody(fetchMock: ReturnType<typeof stubCreate>): unknown {
  return JSON.parse(String(fetchMock.mock.calls[0]?.[1]?.body));
}

describe("run command", () => {
  let stdout: string[];
  let stderr: string[];

  beforeEach(() => {
    stdout = [];
    stderr = [];
    vi.spyOn(console, "log").mockImplementation((msg: string) => {
      stdout.push(msg);
    });
    vi.spyOn(console, "error").mockImplementation((msg: string) => {
      stderr.push(msg);
    });

    vi.stubEnv("CALLGATE_API_KEY", "test-secret");
    vi.stubEnv("CALLGATE_API_BASE_URL", "http://api.test");
    vi.stubEnv("CALLGATE_UI_BASE_URL", "https://ui.test");
    vi.stubEnv("AGENT_ID", "agent-1");
    vi.stubEnv("PHONE_NUMBERS", "+15551234567, +15557654321");
    vi.stubEnv("TAG_IDS", "smoke");
    vi.stubEnv("TEST_CASE_IDS", "");
    vi.stubEnv("PERSONA_OVERRIDE", "");
    vi.stubEnv("SCENARIO_OVERRIDE", "");
    vi.stubEnv("LOG_LEVEL", "info");
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    vi.unstubAllGlobals();
  });

  it("prints only the run id on stdout and logs the rest to stderr", async () => {
    const fetchMock = stubCreate();

    const code = await runCommand({});

    expect(code).toBe(0);
    expect(stdout).toEqual(["run-42"]);
    expect(stderr).toContain("Running tests with tags: smoke");
    expect(stderr).toContain("Test Run ID: run-42");
    expect(stderr).toContain("View in UI: https://ui.test/test-runs/run-42");
    expect(stderr).toContain("Test cases queued: 1");
    expect(fetchMock.mock.calls[0]?.[0]).toBe("http://api.test/test-runs/test-inbound-agent");
    expect(sentBody(fetchMock)).toEqual({
      agentId: "agent-1",
      phoneNumbers: ["+15551234567", "+15557654321"],
      tagIds: ["smoke"],
    });
  });

  it("lets command-line test case ids replace the tag selection from the environment", async () => {
    const fetchMock = stubCreate();

    const code = await runCommand({ testCaseIds: "tc-1, tc-2", persona: "impatient caller" });

    expect(code).toBe(0);
    expect(sentBody(fetchMock)).toEqual({
      agentId: "agent-1",
      phoneNumbers: ["+15551234567", "+15557654321"],
      testConfigurations: [
        { testCaseId: "tc-1", personaOverride: "impatient caller" },
        { testCaseId: "tc-2", personaOverride: "impatient caller" },
      ],
    });
  });

  it("rejects both selections from the environment without calling the service", async () => {
    vi.stubEnv("TEST_CASE_IDS", "tc-1");
    const fetchMock = stubCreate();

    const code = await runCommand({});

    expect(code).toBe(1);
    expect(fetchMock).not.toHaveBeenCalled();
    expect(stdout).toEqual([]);
    expect(
      stderr.some((line) => line.includes("Cannot specify both tag ids and test case ids"))
    ).toBe(true);
  });

  it("rejects a phone number without a plus before any request", async () => {
    vi.stubEnv("PHONE_NUMBERS", "5551234567");
    const fetchMock = stubCreate();

    const code = await runCommand({});

    expect(code).toBe(1);
    expect(fetchMock).not.toHaveBeenCalled();
    expect(stdout).toEqual([]);
    expect(
      stderr.some(
        (line) =>
          line.includes("Phone number must start with '+': 5551234567") &&
          line.includes("(validation_error)")
      )
    ).toBe(true);
  });

  it("fails when the service queued no test cases", async () => {
    stubCreate({ ...created, testCaseRuns: [] });

    const code = await runCommand({});

    expect(code).toBe(1);
    expect(stdout).toEqual([]);
    expect(stderr.some((line) => line.includes("No test cases matched the selection"))).toBe(true);
  });
});
