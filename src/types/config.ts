/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * Generation backend configuration.
 */
export interface GenerationConfig {
    /** Model identifier sent to the backend */
    model: string;
    /** Sampling temperature (0.0 to 2.0) */
    temperature: number;
    /** Upper bound on the reply size, in tokens */
    maxOutputTokens: number;
    /** Timeout of a single request */
    requestTimeoutMs: number;
    /** OpenAI-compatible API root */
    baseUrl: string;
}

/**
 * Retry-with-backoff policy for transient backend failures.
 */
export interface RetryConfig {
    /** Total calls allowed, the first one included */
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    /** Random extra delay as a fraction of the exponential delay (0.0 to 1.0) */
    jitterRatio: number;
    /** Upper bound on total elapsed time across all attempts */
    deadlineMs: number;
}

/**
 * Everything one analysis run needs. Passed explicitly to each component.
 */
export interface AnalysisConfig {
    /** Backend credential */
    apiKey: string;
    generation: GenerationConfig;
    retry: RetryConfig;
}

/**
 * Full CLI configuration merged from flags, env vars, and config file.
 */
export interface AppConfig extends AnalysisConfig {
    logLevel: LogLevel;
    jsonLogs: boolean;
}

export const DEFAULT_GENERATION_CONFIG: GenerationConfig = {
    model: 'gpt-4',
    temperature: 0.3,
    maxOutputTokens: 4096,
    requestTimeoutMs: 30000,
    baseUrl: 'https://api.openai.com/v1',
};

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
    maxAttempts: 3,
    baseDelayMs: 4000,
    maxDelayMs: 10000,
    jitterRatio: 0.5,
    deadlineMs: 120000,
};

/**
 * Default configuration values. The API key has no default.
 */
export const DEFAULT_CONFIG: Omit<AppConfig, 'apiKey'> = {
    generation: DEFAULT_GENERATION_CONFIG,
    retry: DEFAULT_RETRY_CONFIG,
    logLevel: 'info',
    jsonLogs: false,
};
