import type { Env } from '@autodj/config';
import type { AutoDjSettings } from './autoplay/controller.js';

export function autoDjSettingsFromEnv(env: Env): AutoDjSettings {
  return {
    repeatWindow: env.AUTODJ_REPEAT_WINDOW,
    cooldownMs: env.AUTODJ_COOLDOWN_MS,
    maxCooldownMs: env.AUTODJ_MAX_COOLDOWN_MS,
    failureThreshold: env.AUTODJ_FAILURE_THRESHOLD,
    upstreamCooldownMs: env.AUTODJ_UPSTREAM_COOLDOWN_MS,
  };
}
