/**
 * OAuth token status as reported by GET /auth/status
 */

export interface TokenStatus {
  has_tokens: boolean;
  is_expired: boolean;
  expires_at: string | null;
  time_until_expiry: string;
  expires_in_seconds: number | null;
}

function formatDuration(seconds: number): string {
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  return hours > 0 ? `${hours}h ${minutes}m` : `${minutes}m`;
}

/**
 * Describe tokens expiring at `expiresAt` (unix seconds) as seen at `now`.
 * `null` means no tokens are stored.
 */
export function describeTokenStatus(
  expiresAt: number | null,
  now: number = Math.floor(Date.now() / 1000)
): TokenStatus {
  if (expiresAt === null) {
    return {
      has_tokens: false,
      is_expired: true,
      expires_at: null,
      time_until_expiry: "No tokens",
      expires_in_seconds: null,
    };
  }

  const expiresAtIso = new Date(expiresAt * 1000).toISOString();

  if (now >= expiresAt) {
    return {
      has_tokens: true,
      is_expired: true,
      expires_at: expiresAtIso,
      time_until_expiry: `${formatDuration(now - expiresAt)} ago`,
      expires_in_seconds: null,
    };
  }

  const remaining = expiresAt - now;
  return {
    has_tokens: true,
    is_expired: false,
    expires_at: expiresAtIso,
    time_until_expiry: formatDuration(remaining),
    expires_in_seconds: remaining,
  };
}
