/**
 * Model nicknames the proxy resolves, smallest to largest
 */
export const MODEL_NICKNAMES = ["xs", "s", "m", "l", "xl", "xxl"] as const;

export type ModelNickname = (typeof MODEL_NICKNAMES)[number];
