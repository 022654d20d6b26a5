export interface BackoffSettings {
  cooldownMs: number;
  maxCooldownMs: number;
  failureThreshold: number;
}

export function shouldRefillQueue(pending: number, target: number): boolean {
  return Number.isFinite(pending) && pending < Math.max(0, target);
}

export function intervalElapsed(lastTriggerAt: number | null, now: number, intervalMs: number): boolean {
  return lastTriggerAt === null || now - lastTriggerAt >= intervalMs;
}

/**
 * Base cooldown below the failure threshold, then doubling per extra
 * consecutive failure, capped at maxCooldownMs.
 */
export function cooldownDelay(consecutiveFailures: number, settings: BackoffSettings): number {
  const { cooldownMs, maxCooldownMs, failureThreshold } = settings;
  if (consecutiveFailures < failureThreshold) {
    return Math.min(cooldownMs, maxCooldownMs);
  }
  const exponent = consecutiveFailures - failureThreshold + 1;
  return Math.min(maxCooldownMs, cooldownMs * 2 ** exponent);
}
