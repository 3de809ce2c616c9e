import type { RetryConfig } from '../types/index.js';
import { getLogger } from './logger.js';

const logger = getLogger();

/**
 * Exponential backoff with jitter, bounded by attempt count and a total
 * deadline. Holds no state between runs, so one policy can serve
 * concurrent callers.
 */
export class RetryPolicy {
    constructor(
        readonly config: Readonly<RetryConfig>,
        private readonly random: () => number = Math.random
    ) {}

    get maxAttempts(): number {
        return this.config.maxAttempts;
    }

    get deadlineMs(): number {
        return this.config.deadlineMs;
    }

    /**
     * Delay before the next call, after `attempt` (1-based) has failed.
     * A server-provided retry-after wins over the computed backoff.
     */
    delayFor(attempt: number, retryAfterMs?: number): number {
        if (retryAfterMs !== undefined) {
            return Math.max(0, retryAfterMs);
        }
        const exponential = this.config.baseDelayMs * Math.pow(2, attempt - 1);
        const jitter = this.random() * exponential * this.config.jitterRatio;
        return Math.min(this.config.maxDelayMs, exponential + jitter);
    }

    hasAttemptsLeft(attempt: number): boolean {
        return attempt < this.config.maxAttempts;
    }
}

/**
 * What each attempt receives.
 */
export interface AttemptContext {
    /** 1-based */
    attempt: number;
    /** Aborted when the deadline passes */
    signal: AbortSignal;
    remainingMs: number;
}

/**
 * Hooks that adapt `withRetry` to an error taxonomy.
 */
export interface RetryHooks {
    isRetryable(error: unknown): boolean;
    retryAfterMs?(error: unknown): number | undefined;
    /** Error to raise once every attempt has failed */
    onExhausted(lastError: unknown, attempts: number): Error;
    /** Error to raise when the deadline cuts the run short */
    onDeadline(lastError: unknown, attempts: number, elapsedMs: number): Error;
    /** Label used in log lines */
    label?: string;
    /** Overrides the policy's deadline for this run */
    deadlineMs?: number;
    sleep?: (ms: number) => Promise<void>;
    now?: () => number;
}

/**
 * Raised internally when an attempt outlives the deadline.
 */
class DeadlineExceededError extends Error {
    constructor(readonly afterMs: number) {
        super(`Deadline exceeded after ${afterMs}ms`);
        this.name = 'DeadlineExceededError';
    }
}

/**
 * Run `operation` under `policy`, retrying what `hooks.isRetryable` accepts.
 */
export async function withRetry<T>(
    operation: (context: AttemptContext) => Promise<T>,
    policy: RetryPolicy,
    hooks: RetryHooks
): Promise<{ value: T; attempts: number }> {
    const sleepFn = hooks.sleep ?? sleep;
    const now = hooks.now ?? Date.now;
    const label = hooks.label ?? 'operation';
    const deadlineMs = hooks.deadlineMs ?? policy.deadlineMs;
    const startedAt = now();
    let lastError: unknown;

    for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
        const remainingMs = deadlineMs - (now() - startedAt);
        if (remainingMs <= 0) {
            throw hooks.onDeadline(lastError, attempt - 1, now() - startedAt);
        }

        try {
            const value = await runWithin(remainingMs, (signal) => operation({ attempt, signal, remainingMs }));
            return { value, attempts: attempt };
        } catch (error) {
            if (error instanceof DeadlineExceededError) {
                throw hooks.onDeadline(lastError ?? error, attempt, now() - startedAt);
            }
            if (!hooks.isRetryable(error)) {
                throw error;
            }
            lastError = error;

            if (!policy.hasAttemptsLeft(attempt)) {
                break;
            }

            const delayMs = policy.delayFor(attempt, hooks.retryAfterMs?.(error));
            const elapsedMs = now() - startedAt;
            if (elapsedMs + delayMs >= deadlineMs) {
                logger.warn({ attempt, delayMs, elapsedMs, deadlineMs }, `${label}: backoff would pass the deadline, giving up`);
                throw hooks.onDeadline(lastError, attempt, elapsedMs);
            }

            logger.warn(
                {
                    attempt,
                    maxAttempts: policy.maxAttempts,
                    delayMs: Math.round(delayMs),
                    reason: error instanceof Error ? error.message : String(error),
                },
                `${label}: retryable failure, backing off`
            );
            await sleepFn(delayMs);
        }
    }

    throw hooks.onExhausted(lastError, policy.maxAttempts);
}

/**
 * Race `operation` against a timer; abort its signal when the timer wins.
 */
async function runWithin<T>(ms: number, operation: (signal: AbortSignal) => Promise<T>): Promise<T> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            controller.abort();
            reject(new DeadlineExceededError(ms));
        }, ms);
    });

    try {
        return await Promise.race([operation(controller.signal), timeout]);
    } finally {
        clearTimeout(timer);
    }
}

/**
 * Sleep for the specified number of milliseconds.
 */
export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
