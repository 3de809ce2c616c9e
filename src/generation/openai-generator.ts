import { z } from 'zod';
import type { GeneratedText, GenerationParams, Prompt, TextGenerator } from '../types/index.js';
import { createHttpClient, HttpError, isRetryableStatus, type HttpClient } from '../utils/http-client.js';
import {
    AuthError,
    FatalServiceError,
    MalformedResponseError,
    PipelineError,
    RateLimitError,
    TransientServiceError,
} from '../pipeline/errors.js';
import { getLogger } from '../utils/logger.js';

const logger = getLogger();

/**
 * Chat-completions reply (subset of relevant fields).
 */
const ChatCompletionSchema = z.object({
    model: z.string().optional(),
    choices: z
        .array(
            z.object({
                message: z.object({ content: z.string().nullable() }),
                finish_reason: z.string().nullable().optional(),
            })
        )
        .min(1),
    usage: z
        .object({
            prompt_tokens: z.number(),
            completion_tokens: z.number(),
            total_tokens: z.number(),
        })
        .optional(),
});

/**
 * Error body OpenAI-compatible APIs return (subset).
 */
const ApiErrorSchema = z.object({
    error: z.object({
        message: z.string().optional(),
        type: z.string().nullable().optional(),
        code: z.string().nullable().optional(),
    }),
});

const POLICY_CODES = new Set(['content_policy_violation', 'content_filter']);
const QUOTA_CODES = new Set(['insufficient_quota', 'billing_hard_limit_reached']);

/**
 * OpenAI-compatible chat-completions backend.
 *
 * @see https://platform.openai.com/docs/api-reference/chat
 */
export class OpenAiGenerator implements TextGenerator {
    readonly name = 'openai';
    private readonly baseUrl: string;
    private readonly apiKey: string;
    private readonly httpClient: HttpClient;

    constructor(options: { apiKey: string; baseUrl: string; httpClient?: HttpClient }) {
        this.apiKey = options.apiKey;
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
        this.httpClient = options.httpClient ?? createHttpClient();
    }

    async generate(prompt: Prompt, params: GenerationParams): Promise<GeneratedText> {
        const url = `${this.baseUrl}/chat/completions`;

        let data: unknown;
        try {
            const response = await this.httpClient.post(
                url,
                {
                    model: params.model,
                    messages: [
                        { role: 'system', content: prompt.system },
                        { role: 'user', content: prompt.user },
                    ],
                    temperature: params.temperature,
                    max_tokens: params.maxOutputTokens,
                },
                {
                    headers: { Authorization: `Bearer ${this.apiKey}` },
                    timeout: params.timeoutMs,
                    signal: params.signal,
                }
            );
            data = response.data;
        } catch (error) {
            throw classifyHttpError(error);
        }

        const parsed = ChatCompletionSchema.safeParse(data);
        if (!parsed.success) {
            throw new FatalServiceError('Backend reply does not look like a chat completion', data);
        }

        const choice = parsed.data.choices[0];
        if (choice?.finish_reason === 'content_filter') {
            throw new FatalServiceError('Reply withheld by the content filter', data);
        }
        const text = choice?.message.content ?? '';
        if (text.trim().length === 0) {
            throw new MalformedResponseError('Backend returned an empty reply', text, data);
        }
        if (choice?.finish_reason === 'length') {
            logger.warn({ maxOutputTokens: params.maxOutputTokens }, 'Reply truncated at the output token limit');
            throw new MalformedResponseError(
                `Reply truncated at the output token limit (${params.maxOutputTokens} tokens)`,
                text,
                data
            );
        }

        const usage = parsed.data.usage;
        return {
            text,
            model: parsed.data.model ?? params.model,
            ...(usage
                ? {
                      usage: {
                          promptTokens: usage.prompt_tokens,
                          completionTokens: usage.completion_tokens,
                          totalTokens: usage.total_tokens,
                      },
                  }
                : {}),
        };
    }
}

/**
 * Map a transport failure onto the pipeline's error taxonomy.
 */
export function classifyHttpError(error: unknown): PipelineError {
    if (error instanceof PipelineError) {
        return error;
    }
    if (!(error instanceof HttpError)) {
        return new TransientServiceError(
            `Generation request failed: ${error instanceof Error ? error.message : String(error)}`,
            error
        );
    }

    const apiError = ApiErrorSchema.safeParse(error.response);
    const code = apiError.success ? apiError.data.error.code ?? apiError.data.error.type ?? undefined : undefined;
    const message = apiError.success && apiError.data.error.message ? apiError.data.error.message : error.message;
    const diagnostic = error.response ?? error.message;

    if (error.status === 401 || error.status === 403) {
        return new AuthError(`Credential rejected: ${message}`, diagnostic);
    }
    if (error.status === 429) {
        if (code !== undefined && QUOTA_CODES.has(code)) {
            return new FatalServiceError(`Quota exhausted: ${message}`, diagnostic);
        }
        return new RateLimitError(`Rate limited: ${message}`, error.retryAfterMs, diagnostic);
    }
    if (code !== undefined && POLICY_CODES.has(code)) {
        return new FatalServiceError(`Rejected by content policy: ${message}`, diagnostic);
    }
    if (error.retryable || isRetryableStatus(error.status) || (error.status === 0 && !error.aborted)) {
        return new TransientServiceError(`Backend unavailable: ${message}`, diagnostic);
    }
    if (error.aborted) {
        return new TransientServiceError(`Generation request aborted: ${message}`, diagnostic);
    }
    return new FatalServiceError(`Request rejected: ${message}`, diagnostic);
}
