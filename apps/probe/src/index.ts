export {
  ProxyClient,
  ANTHROPIC_VERSION,
  type FetchLike,
  type ProxyClientOptions,
  type ProxyFetchInit,
  type ProxyResponse,
} from "./http/proxy-client.js";
export {
  ProxyAbortedError,
  ProxyConnectionError,
  ProxyHttpError,
  ProxyRequestError,
  ProxyResponseError,
  ProxyTimeoutError,
} from "./http/errors.js";
export { parseSseStream, type SseEvent } from "./http/sse.js";
export type { Message, MessageRequest, ContentBlock } from "./http/messages.js";
export { ConsoleReporter, type OutputSink } from "./output/console-reporter.js";
export * from "./checks/index.js";
export { runChecks, SuiteInterruptedError, type CheckResult } from "./suites/runner.js";
export { runComprehensiveSuite, COMPREHENSIVE_CHECKS, type SuiteOutcome } from "./suites/full-suite.js";
export { runQuickModels, QUICK_MODEL_CASES, type ModelCase } from "./suites/quick-models.js";
export { checkProxyRunning } from "./suites/proxy-check.js";
export { buildSuiteReport, writeSuiteReport, type SuiteReport } from "./report/suite-report.js";
export { summarize, decideVerdict, exitCodeFor, type Verdict } from "./domain/tally.js";
