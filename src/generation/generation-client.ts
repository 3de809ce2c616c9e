import type { GenerationConfig, Prompt, RawResponse, RetryConfig, TextGenerator } from '../types/index.js';
import { RateLimitError, TransientServiceError } from '../pipeline/errors.js';
import { validateGenerationConfig, validateRetryConfig } from '../utils/config-schema.js';
import { RetryPolicy, withRetry } from '../utils/retry.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

/**
 * Test seams for time and randomness.
 */
export interface GenerationClientOptions {
    sleep?: (ms: number) => Promise<void>;
    now?: () => number;
    random?: () => number;
}

/**
 * Sends prompts to a TextGenerator, retrying transient failures.
 *
 * `TransientServiceError` and `RateLimitError` are retried; every other
 * error propagates on first sight. Exhausting attempts or the deadline
 * raises `TransientServiceError` with the last failure as diagnostic.
 */
export class GenerationClient {
    readonly config: Readonly<GenerationConfig>;
    readonly policy: RetryPolicy;

    constructor(
        private readonly generator: TextGenerator,
        config: { generation: GenerationConfig; retry: RetryConfig },
        private readonly options: GenerationClientOptions = {}
    ) {
        this.config = validateGenerationConfig(config.generation);
        this.policy = new RetryPolicy(validateRetryConfig(config.retry), options.random);
    }

    /**
     * @param options.deadlineMs - Caller bound on total time, retries included
     */
    async generate(prompt: Prompt, options: { deadlineMs?: number } = {}): Promise<RawResponse> {
        const { model, temperature, maxOutputTokens, requestTimeoutMs } = this.config;

        const { value, attempts } = await withRetry(
            async ({ attempt, signal, remainingMs }) => {
                logger.debug({ backend: this.generator.name, model, attempt }, 'Sending generation request');
                return this.generator.generate(prompt, {
                    model,
                    temperature,
                    maxOutputTokens,
                    timeoutMs: Math.min(requestTimeoutMs, remainingMs),
                    signal,
                });
            },
            this.policy,
            {
                label: `generation (${this.generator.name})`,
                isRetryable: (error) => error instanceof TransientServiceError || error instanceof RateLimitError,
                retryAfterMs: (error) => (error instanceof RateLimitError ? error.retryAfterMs : undefined),
                onExhausted: (lastError, count) =>
                    new TransientServiceError(
                        `Generation failed after ${count} attempts: ${describeError(lastError)}`,
                        diagnosticOf(lastError)
                    ),
                onDeadline: (lastError, count, elapsedMs) =>
                    new TransientServiceError(
                        `Generation deadline passed after ${Math.round(elapsedMs)}ms and ${count} attempt(s)` +
                            (lastError ? `: ${describeError(lastError)}` : ''),
                        diagnosticOf(lastError)
                    ),
                ...(options.deadlineMs !== undefined ? { deadlineMs: options.deadlineMs } : {}),
                ...(this.options.sleep ? { sleep: this.options.sleep } : {}),
                ...(this.options.now ? { now: this.options.now } : {}),
            }
        );

        logger.info({ model: value.model, attempts, usage: value.usage }, 'Generation complete');
        return { ...value, attempts };
    }
}

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function diagnosticOf(error: unknown): unknown {
    if (error instanceof RateLimitError || error instanceof TransientServiceError) {
        return error.diagnostic ?? error.message;
    }
    return error instanceof Error ? error.message : error;
}
