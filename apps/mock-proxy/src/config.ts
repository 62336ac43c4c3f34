/**
 * Runtime configuration for mock proxy behavior
 * Can be updated via API during tests
 */

export interface MockProxyConfig {
  // Health & auth
  healthy: boolean;
  /** Required API key for /v1/messages; null disables key auth */
  apiKey: string | null;
  /** Unix seconds the stored OAuth tokens expire at; null = no tokens */
  tokenExpiresAt: number | null;

  // Simulated upstream behavior
  /** Nicknames or resolved model ids that answer 404 */
  unavailableModels: string[];
  thinkingSupported: boolean;
  /** Every message call fails with the upstream "Invalid bearer token" 401 */
  upstreamAuthFailure: boolean;

  // Canned content
  responseText: string;
  thinkingText: string;
  streamChunkSize: number;
}

const TOKEN_LIFETIME_SECONDS = 8 * 60 * 60;

function defaultConfig(): MockProxyConfig {
  return {
    healthy: true,
    apiKey: null,
    tokenExpiresAt: Math.floor(Date.now() / 1000) + TOKEN_LIFETIME_SECONDS,
    unavailableModels: [],
    thinkingSupported: true,
    upstreamAuthFailure: false,
    responseText: "Hello from the mock proxy.",
    thinkingText: "15 * 23 = 15 * 20 + 15 * 3 = 300 + 45 = 345.",
    streamChunkSize: 8,
  };
}

export class MockConfigHolder {
  private current: MockProxyConfig;

  constructor(private readonly initial: Partial<MockProxyConfig> = {}) {
    this.current = { ...defaultConfig(), ...initial };
  }

  get(): MockProxyConfig {
    return { ...this.current, unavailableModels: [...this.current.unavailableModels] };
  }

  update(updates: Partial<MockProxyConfig>): MockProxyConfig {
    this.current = { ...this.current, ...updates };
    return this.get();
  }

  /** Back to defaults plus whatever the instance was built with */
  reset(): MockProxyConfig {
    this.current = { ...defaultConfig(), ...this.initial };
    return this.get();
  }
}
