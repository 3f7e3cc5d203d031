export interface RetryConfig {
  /** Total attempts including the first */
  attempts?: number;
  /** Delay before the second attempt; doubles after each further failure */
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Spread applied to each delay, 0..1 */
  jitter?: number;
}

export interface RetryContext {
  attempt: number;
  attempts: number;
  /** Wait that preceded this attempt */
  delayMs: number;
}

export interface RetryPolicyOptions {
  random?: () => number;
  wait?: (ms: number) => Promise<void>;
}

function waitFor(ms: number): Promise<void> {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

/**
 * Retry policy object: attempt budget, exponential backoff schedule and the
 * predicate deciding which failures are worth another attempt.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly jitter: number;
  private readonly random: () => number;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(
    config: RetryConfig,
    private readonly retryable: (err: unknown) => boolean,
    options: RetryPolicyOptions = {}
  ) {
    this.maxAttempts = Math.max(1, Math.floor(config.attempts ?? 1));
    this.baseDelayMs = Math.max(0, config.baseDelayMs ?? 200);
    this.maxDelayMs = Math.max(0, config.maxDelayMs ?? 5000);
    this.jitter = Math.min(1, Math.max(0, config.jitter ?? 0.2));
    this.random = options.random ?? Math.random;
    this.wait = options.wait ?? waitFor;
  }

  /** Nominal waits before attempts 2..maxAttempts, without jitter */
  schedule(): number[] {
    return Array.from({ length: this.maxAttempts - 1 }, (_, i) =>
      Math.min(this.maxDelayMs, this.baseDelayMs * 2 ** i)
    );
  }

  /** Jittered wait before `attempt` (1-based); the first attempt never waits */
  delayBefore(attempt: number): number {
    const nominal = this.schedule()[attempt - 2];
    if (nominal === undefined) return 0;
    const spread = (this.random() * 2 - 1) * this.jitter;
    return Math.max(0, Math.round(nominal * (1 + spread)));
  }

  shouldRetry(err: unknown, attempt: number): boolean {
    return attempt < this.maxAttempts && this.retryable(err);
  }

  async execute<T>(fn: (ctx: RetryContext) => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      const delayMs = this.delayBefore(attempt);
      if (delayMs > 0) await this.wait(delayMs);
      try {
        return await fn({ attempt, attempts: this.maxAttempts, delayMs });
      } catch (err) {
        if (!this.shouldRetry(err, attempt)) throw err;
      }
    }
  }
}
