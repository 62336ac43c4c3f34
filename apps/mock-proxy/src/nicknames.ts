/**
 * Model nickname routing, matching the proxy's built-in map.
 * Unknown names pass through unchanged.
 */

export const MODEL_MAP: Readonly<Record<string, string>> = {
  xs: "claude-3-5-haiku-20241022",
  s: "claude-3-5-sonnet-20241022",
  m: "claude-3-7-sonnet-20250219",
  l: "claude-sonnet-4-20250514",
  xl: "claude-opus-4-20250514",
  xxl: "claude-opus-4-1-20250805",
};

export function resolveModel(nickname: string): string {
  return Object.hasOwn(MODEL_MAP, nickname) ? MODEL_MAP[nickname] : nickname;
}
