import type { MockConfigHolder } from "./config.js";
import type { RequestStore } from "./store.js";

export interface MockProxyState {
  config: MockConfigHolder;
  store: RequestStore;
}
