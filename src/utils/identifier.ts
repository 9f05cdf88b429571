export interface IdentifiableRequest {
  header(name: string): string | undefined;
  ip?: string;
  user?: { id?: string | number };
}

/**
 * Picks the strongest identifier available for a caller's throttle.
 *
 * Priority:
 * 1. API key (x-api-key header)
 * 2. Authenticated user id (req.user, set by auth middleware)
 * 3. IP address
 */
export function getThrottleName(req: IdentifiableRequest, scope: string): string {
  const apiKey = req.header("x-api-key");
  if (apiKey) {
    return `${scope}:apikey:${apiKey}`;
  }

  const userId = req.user?.id;
  if (userId !== undefined && userId !== "") {
    return `${scope}:user:${userId}`;
  }

  return `${scope}:ip:${req.ip ?? "unknown"}`;
}
