import { describeError, ProxyConnectionError } from "../http/errors.js";
import type { ProxyClient } from "../http/proxy-client.js";
import type { ConsoleReporter } from "../output/console-reporter.js";

export interface ProxyCheckOptions {
  client: ProxyClient;
  reporter: ConsoleReporter;
  timeoutMs: number;
}

/**
 * Is anything answering /healthz on the local proxy URL?
 */
export async function checkProxyRunning({ client, reporter, timeoutMs }: ProxyCheckOptions): Promise<0 | 1> {
  try {
    const response = await client.request("GET", "/healthz", { timeoutMs, authenticated: false });

    if (response.status !== 200) {
      reporter.line(`⚠️ Proxy responded but with status ${response.status}`);
      return 1;
    }

    const body = response.json();
    reporter.line("✅ Proxy is running!");
    reporter.line(`Response: ${JSON.stringify(body)}`);
    return 0;
  } catch (error) {
    if (error instanceof ProxyConnectionError) {
      reporter.line("❌ Proxy is NOT running!");
      reporter.blank();
      reporter.line("To start it:");
      reporter.line("  cd /path/to/maximize");
      reporter.line("  ./target/release/maximize");
      reporter.line("  (then choose option 1 - Start Proxy)");
      reporter.blank();
      reporter.line("Or run the mock proxy from this repo:");
      reporter.line("  npm run mock-proxy");
      return 1;
    }

    reporter.line(`❌ Error checking proxy: ${describeError(error)}`);
    return 1;
  }
}
