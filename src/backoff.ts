import { CancelledError } from "./errors";

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * setTimeout as a promise. Rejects with CancelledError if `signal` aborts
 * before the delay elapses.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export function jitter(ms: number, random: () => number = Math.random): number {
  const rand = random() * 0.3 + 0.85; // 0.85..1.15
  return Math.round(ms * rand);
}

export type BackoffOptions = {
  initialDelayMs?: number;
  maxDelayMs?: number;
  factor?: number;
  jitter?: boolean;
  sleepImpl?: SleepFn;
  random?: () => number;
};

/**
 * Delay schedule shared by startup health-gating and the retry coordinator.
 *
 * Attempt `n` (1-based) waits `initialDelayMs * factor^(n-1)`, capped at
 * `maxDelayMs`. `factor = 1` gives a fixed delay.
 */
export class BackoffPolicy {
  readonly initialDelayMs: number;
  readonly maxDelayMs: number;
  readonly factor: number;
  private readonly useJitter: boolean;
  private readonly sleepImpl: SleepFn;
  private readonly random: () => number;

  constructor({
    initialDelayMs = 1000,
    maxDelayMs = 8000,
    factor = 2,
    jitter = false,
    sleepImpl = sleep,
    random = Math.random,
  }: BackoffOptions = {}) {
    this.initialDelayMs = Math.max(initialDelayMs, 0);
    this.maxDelayMs = Math.max(maxDelayMs, this.initialDelayMs);
    this.factor = Math.max(factor, 1);
    this.useJitter = jitter;
    this.sleepImpl = sleepImpl;
    this.random = random;
  }

  delayFor(attempt: number): number {
    const n = Math.max(attempt, 1);
    const raw = Math.min(
      this.initialDelayMs * this.factor ** (n - 1),
      this.maxDelayMs
    );
    return this.useJitter ? jitter(raw, this.random) : raw;
  }

  /**
   * Sleeps for the delay that follows failed attempt `attempt`.
   */
  wait(attempt: number, signal?: AbortSignal): Promise<void> {
    return this.sleepImpl(this.delayFor(attempt), signal);
  }
}
