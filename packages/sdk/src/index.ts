export { TestRunsClient, toInboundAgentBody } from "./client.js";
export { getTestRunUrl, getTestCaseUrl } from "./urls.js";
export type { TestRunsClientConfig, InboundAgentBody, RequestOptions } from "./types.js";
