export type { CheckFn, ProbeCheck, ProbeContext, ProbeSettings } from "./types.js";
export { checkHealth } from "./health.js";
export { checkAuthStatus } from "./auth-status.js";
export { checkApiKeyAuth } from "./api-key-auth.js";
export { checkNonStreaming } from "./non-streaming.js";
export { checkStreaming } from "./streaming.js";
export { checkModelNicknames } from "./nicknames.js";
export { checkExtendedThinking, THINKING_BUDGET_TOKENS, THINKING_PROMPT } from "./extended-thinking.js";
export { testModelPrompt } from "./model-prompt.js";
