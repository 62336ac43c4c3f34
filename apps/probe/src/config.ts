import { loadConfig, type Config } from "@maximize-probe/config";

export const config: Config = loadConfig();
export type { Config };
