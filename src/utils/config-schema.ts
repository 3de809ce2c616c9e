import { z } from 'zod';
import {
    DEFAULT_GENERATION_CONFIG,
    DEFAULT_RETRY_CONFIG,
    type AnalysisConfig,
    type GenerationConfig,
    type RetryConfig,
} from '../types/index.js';
import { ConfigurationError } from '../pipeline/errors.js';

/**
 * Schemas are strict: an unknown key is an error, never ignored.
 * Nothing is clamped; out-of-range values are rejected.
 */
export const GenerationConfigSchema = z
    .object({
        model: z.string().trim().min(1, 'model must not be empty'),
        temperature: z.number().min(0).max(2),
        maxOutputTokens: z.number().int().min(1).max(32768),
        requestTimeoutMs: z.number().int().min(1000).max(600000),
        baseUrl: z.string().url(),
    })
    .strict();

export const RetryConfigSchema = z
    .object({
        maxAttempts: z.number().int().min(1).max(10),
        baseDelayMs: z.number().int().min(0).max(60000),
        maxDelayMs: z.number().int().min(0).max(300000),
        jitterRatio: z.number().min(0).max(1),
        deadlineMs: z.number().int().min(1).max(3600000),
    })
    .strict()
    .refine((retry) => retry.maxDelayMs >= retry.baseDelayMs, {
        message: 'maxDelayMs must be at least baseDelayMs',
        path: ['maxDelayMs'],
    });

export const AnalysisConfigSchema = z
    .object({
        apiKey: z.string().trim().min(1, 'API key is missing (set OPENAI_API_KEY)'),
        generation: GenerationConfigSchema,
        retry: RetryConfigSchema,
    })
    .strict();

/**
 * Shape of `postmortem.config.json`. Every field is optional; the credential
 * is never read from a file.
 */
export const ConfigFileSchema = z
    .object({
        generation: GenerationConfigSchema.partial().strict().optional(),
        retry: z
            .object({
                maxAttempts: z.number(),
                baseDelayMs: z.number(),
                maxDelayMs: z.number(),
                jitterRatio: z.number(),
                deadlineMs: z.number(),
            })
            .partial()
            .strict()
            .optional(),
        logLevel: z.enum(['error', 'warn', 'info', 'debug', 'silent']).optional(),
        jsonLogs: z.boolean().optional(),
    })
    .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Render zod issues as `path: message` lines.
 */
export function formatIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => {
        const path = issue.path.join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
    });
}

function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, what: string): T {
    const result = schema.safeParse(input);
    if (!result.success) {
        const issues = formatIssues(result.error);
        throw new ConfigurationError(`Invalid ${what}: ${issues.join('; ')}`, issues);
    }
    return result.data;
}

export function validateGenerationConfig(input: unknown): GenerationConfig {
    return Object.freeze(parseOrThrow(GenerationConfigSchema, input, 'generation config'));
}

export function validateRetryConfig(input: unknown): RetryConfig {
    return Object.freeze(parseOrThrow(RetryConfigSchema, input, 'retry config'));
}

/**
 * Validate a complete AnalysisConfig and return a frozen copy.
 */
export function validateAnalysisConfig(input: unknown): AnalysisConfig {
    const config = parseOrThrow(AnalysisConfigSchema, input, 'analysis config');
    return Object.freeze({
        apiKey: config.apiKey,
        generation: Object.freeze(config.generation),
        retry: Object.freeze(config.retry),
    });
}

/**
 * Build an AnalysisConfig from partial overrides over the defaults, then
 * validate it.
 */
export function createAnalysisConfig(overrides: {
    apiKey: string;
    generation?: Partial<GenerationConfig>;
    retry?: Partial<RetryConfig>;
}): AnalysisConfig {
    return validateAnalysisConfig({
        apiKey: overrides.apiKey,
        generation: { ...DEFAULT_GENERATION_CONFIG, ...overrides.generation },
        retry: { ...DEFAULT_RETRY_CONFIG, ...overrides.retry },
    });
}
