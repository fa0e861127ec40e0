import {
  AuthenticationError,
  NotFoundError,
  RemoteServiceError,
  TestRunResponseSchema,
  TestRunResultsSchema,
  TestRunStatusResponseSchema,
} from "@callgate/shared";
import type {
  TestRunRequest,
  TestRunResponse,
  TestRunResults,
  TestRunStatusResponse,
} from "@callgate/shared";
import type { ZodType, ZodTypeDef } from "zod";
import type { InboundAgentBody, RequestOptions, TestRunsClientConfig } from "./types.js";

export function toInboundAgentBody(request: TestRunRequest): InboundAgentBody {
  const base = { agentId: request.agentId, phoneNumbers: request.phoneNumbers };
  switch (request.selection.kind) {
    case "tags":
      return { ...base, tagIds: request.selection.tagIds };
    case "testCases":
      return { ...base, testConfigurations: request.selection.testConfigurations };
  }
}

/**
 * Thin client over the test-runs REST surface. Every non-2xx response is
 * mapped onto the shared error taxonomy; nothing is retried.
 */
export class TestRunsClient {
  private apiKey: string;
  private baseUrl: string;

  constructor(config: TestRunsClientConfig) {
    if (!config.apiKey) {
      throw new AuthenticationError("An API key is required");
    }
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
  }

  async createTestRun(request: TestRunRequest): Promise<TestRunResponse> {
    return this.request(
      "POST",
      "/test-runs/test-inbound-agent",
      TestRunResponseSchema,
      toInboundAgentBody(request)
    );
  }

  async getStatus(testRunId: string, opts: RequestOptions = {}): Promise<TestRunStatusResponse> {
    return this.request(
      "GET",
      `/test-runs/${encodeURIComponent(testRunId)}/status`,
      TestRunStatusResponseSchema,
      undefined,
      opts
    );
  }

  async getResults(testRunId: string, opts: RequestOptions = {}): Promise<TestRunResults> {
    return this.request(
      "GET",
      `/test-runs/${encodeURIComponent(testRunId)}/results`,
      TestRunResultsSchema,
      undefined,
      opts
    );
  }

  private async request<T>(
    method: "GET" | "POST",
    path: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    body?: unknown,
    opts: RequestOptions = {}
  ): Promise<T> {
    const url = `${this.baseUrl}${path}`;

    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          "Content-Type": "application/json",
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        ...(opts.signal ? { signal: opts.signal } : {}),
      });
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new RemoteServiceError(`${method} ${path} failed: ${msg}`, { cause: err });
    }

    if (!response.ok) {
      const text = await response.text();
      switch (response.status) {
        case 401:
        case 403:
          throw new AuthenticationError(
            `${method} ${path} was rejected (${response.status}): check CALLGATE_API_KEY`
          );
        case 404:
          throw new NotFoundError(`${method} ${path} returned 404: ${text || "not found"}`);
        default:
          throw new RemoteServiceError(`${method} ${path} returned ${response.status}: ${text}`, {
            statusCode: response.status,
            body: text,
          });
      }
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch (err) {
      throw new RemoteServiceError(`${method} ${path} returned a non-JSON body`, {
        statusCode: response.status,
        cause: err,
      });
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
        .join("; ");
      throw new RemoteServiceError(`${method} ${path} returned an unexpected body: ${issues}`, {
        statusCode: response.status,
      });
    }
    return parsed.data;
  }
}
