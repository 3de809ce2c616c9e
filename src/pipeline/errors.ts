import type { FailureClassification, FailureRecord, PipelineStage } from '../types/index.js';

/**
 * Base class for every classified pipeline failure.
 */
export class PipelineError extends Error {
    constructor(
        message: string,
        public readonly classification: FailureClassification,
        public readonly diagnostic?: unknown
    ) {
        super(message);
        this.name = 'PipelineError';
    }
}

/**
 * The notes contain nothing but whitespace.
 */
export class EmptyInputError extends PipelineError {
    constructor(message = 'Input document is empty') {
        super(message, 'empty-input');
        this.name = 'EmptyInputError';
    }
}

/**
 * Missing credential, unknown option or out-of-range value.
 */
export class ConfigurationError extends PipelineError {
    constructor(message: string, diagnostic?: unknown) {
        super(message, 'configuration', diagnostic);
        this.name = 'ConfigurationError';
    }
}

/**
 * The backend rejected the credential.
 */
export class AuthError extends PipelineError {
    constructor(message: string, diagnostic?: unknown) {
        super(message, 'auth', diagnostic);
        this.name = 'AuthError';
    }
}

/**
 * The backend asked us to slow down. Retryable.
 */
export class RateLimitError extends PipelineError {
    constructor(
        message: string,
        public readonly retryAfterMs?: number,
        diagnostic?: unknown
    ) {
        super(message, 'rate-limit', diagnostic);
        this.name = 'RateLimitError';
    }
}

/**
 * Timeouts, network errors and 5xx replies. Retryable; also raised once
 * retries are exhausted or the deadline passes.
 */
export class TransientServiceError extends PipelineError {
    constructor(message: string, diagnostic?: unknown) {
        super(message, 'transient-service', diagnostic);
        this.name = 'TransientServiceError';
    }
}

/**
 * Malformed request, exhausted quota or content-policy rejection.
 */
export class FatalServiceError extends PipelineError {
    constructor(message: string, diagnostic?: unknown) {
        super(message, 'fatal-service', diagnostic);
        this.name = 'FatalServiceError';
    }
}

/**
 * The reply held no structured payload that could be salvaged.
 */
export class MalformedResponseError extends PipelineError {
    constructor(
        message: string,
        public readonly raw: string,
        diagnostic?: unknown
    ) {
        super(message, 'malformed-response', diagnostic ?? raw);
        this.name = 'MalformedResponseError';
    }
}

/**
 * Raised by the orchestrator for any stage failure. Wraps the original error
 * in `cause` and describes it in `record`.
 */
export class AnalysisFailure extends Error {
    constructor(
        public readonly record: FailureRecord,
        options?: { cause?: unknown }
    ) {
        super(record.detail, options);
        this.name = 'AnalysisFailure';
    }
}

/**
 * Build a FailureRecord from anything thrown at `stage`.
 */
export function toFailureRecord(error: unknown, stage: PipelineStage): FailureRecord {
    if (error instanceof AnalysisFailure) {
        return error.record;
    }
    if (error instanceof PipelineError) {
        return {
            classification: error.classification,
            stage,
            detail: error.message,
            ...(error.diagnostic !== undefined ? { diagnostic: error.diagnostic } : {}),
        };
    }
    return {
        classification: 'unexpected',
        stage,
        detail: error instanceof Error ? error.message : String(error),
        ...(error instanceof Error && error.stack ? { diagnostic: error.stack } : {}),
    };
}
