/**
 * Hide all but the last four characters of an API key
 */
export function maskApiKey(key: string): string {
  if (key.length <= 4) return "dummy";
  return `${"*".repeat(key.length - 4)}${key.slice(-4)}`;
}

/**
 * First `max` code points, with "..." when the text was cut
 */
export function previewText(text: string, max = 200): string {
  const chars = [...text];
  return chars.length > max ? `${chars.slice(0, max).join("")}...` : text;
}

/** Length in code points, so an emoji counts once */
export function characterCount(text: string): number {
  return [...text].length;
}

/**
 * Render a JSON-ish value for an info line
 */
export function formatValue(value: unknown): string {
  if (value === undefined) return "unknown";
  if (typeof value === "string") return value;
  return JSON.stringify(value);
}
