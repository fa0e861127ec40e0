/**
 * Client-side types. Domain types live in @callgate/shared; these cover the
 * client's own options and the exact JSON bodies it sends.
 */

import type { TestConfiguration } from "@callgate/shared";

export interface TestRunsClientConfig {
  /** Sent as a Bearer token on every request */
  apiKey: string;
  /** REST root, e.g. https://app.hamming.ai/api/rest */
  baseUrl: string;
}

export interface RequestOptions {
  /** Aborts the underlying fetch, e.g. when the caller's deadline passes */
  signal?: AbortSignal;
}

interface InboundAgentBodyBase {
  agentId: string;
  phoneNumbers: string[];
}

// Exactly one selection key is ever present on the wire.
export type InboundAgentBody =
  | (InboundAgentBodyBase & { tagIds: string[] })
  | (InboundAgentBodyBase & { testConfigurations: TestConfiguration[] });
