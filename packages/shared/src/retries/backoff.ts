export type BackoffOptions = {
  baseMs?: number;
  factor?: number;
  maxMs?: number;
  jitterRatio?: number;
  random?: () => number;
};

// 1s, 2s, 4s, ... capped at 30s.
export const DEFAULT_BACKOFF: Readonly<Required<Omit<BackoffOptions, 'random'>>> = Object.freeze({
  baseMs: 1_000,
  factor: 2,
  maxMs: 30_000,
  jitterRatio: 0
});

function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) {
    return min;
  }
  return Math.min(Math.max(value, min), max);
}

/**
 * Delay before the retry that follows failed attempt `attempt` (1-based).
 */
export function computeExponentialBackoff(attempt: number, options: BackoffOptions = {}): number {
  const normalizedAttempt = Math.max(1, Math.floor(attempt));

  const {
    baseMs = DEFAULT_BACKOFF.baseMs,
    factor = DEFAULT_BACKOFF.factor,
    maxMs = DEFAULT_BACKOFF.maxMs,
    jitterRatio = DEFAULT_BACKOFF.jitterRatio,
    random = Math.random
  } = options;

  const cappedDelay = clamp(baseMs * Math.pow(factor, normalizedAttempt - 1), baseMs, maxMs);
  if (jitterRatio <= 0) {
    return Math.round(cappedDelay);
  }

  const jitter = (random() * 2 - 1) * cappedDelay * jitterRatio;
  return Math.round(clamp(cappedDelay + jitter, baseMs, maxMs));
}
