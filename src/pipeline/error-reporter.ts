import type { FailureClassification, FailureRecord, UserMessage } from '../types/index.js';
import { AnalysisFailure, toFailureRecord } from './errors.js';

const MESSAGES: Record<FailureClassification, { category: string; hint: string }> = {
    'empty-input': {
        category: 'Empty input',
        hint: 'The uploaded notes contain no text. Check that you picked the right file.',
    },
    configuration: {
        category: 'Configuration problem',
        hint: 'Check OPENAI_API_KEY and the values in postmortem.config.json or on the command line.',
    },
    auth: {
        category: 'Authentication failed',
        hint: 'Check your API key: it may be wrong, expired or lack access to the model.',
    },
    'rate-limit': {
        category: 'Rate limited',
        hint: 'The service is throttling requests. Wait a minute and retry.',
    },
    'transient-service': {
        category: 'Service unavailable',
        hint: 'Retry in a moment; this is usually a temporary outage or a slow network.',
    },
    'fatal-service': {
        category: 'Request rejected',
        hint: 'The service refused the request. Check your quota, the model name, and the content of the notes.',
    },
    'malformed-response': {
        category: 'Unreadable response',
        hint: 'The model did not return a usable analysis. Retry, or try a different model or a lower temperature.',
    },
    unexpected: {
        category: 'Unexpected error',
        hint: 'Something went wrong. Run again with --verbose and report the details.',
    },
};

/**
 * Map a failure to a short category and remediation hint.
 *
 * Accepts a FailureRecord, an AnalysisFailure or anything else that was
 * thrown. Never throws; unknown input gets the "Unexpected error" category.
 */
export function describe(failure: FailureRecord | AnalysisFailure | Error | unknown): UserMessage {
    try {
        const record = asRecord(failure);
        const known = isClassification(record.classification) ? record.classification : 'unexpected';
        const { category, hint } = MESSAGES[known];

        const diagnostic = formatDiagnostic(record.diagnostic);
        return {
            category,
            hint,
            detail: record.detail || category,
            ...(diagnostic !== undefined ? { diagnostic } : {}),
        };
    } catch {
        return { ...MESSAGES.unexpected, detail: MESSAGES.unexpected.category };
    }
}

function asRecord(failure: unknown): { classification: unknown; detail: string; diagnostic?: unknown } {
    if (failure instanceof AnalysisFailure) return failure.record;
    if (failure instanceof Error) return toFailureRecord(failure, 'derivation');
    if (typeof failure === 'object' && failure !== null && 'classification' in failure) {
        const detail = 'detail' in failure && typeof failure.detail === 'string' ? failure.detail : '';
        return {
            classification: failure.classification,
            detail,
            ...('diagnostic' in failure ? { diagnostic: failure.diagnostic } : {}),
        };
    }
    return { classification: 'unexpected', detail: String(failure) };
}

function isClassification(value: unknown): value is FailureClassification {
    return typeof value === 'string' && Object.prototype.hasOwnProperty.call(MESSAGES, value);
}

/**
 * Pretty-print a diagnostic payload; circular or exotic values fall back
 * to String().
 */
export function formatDiagnostic(diagnostic: unknown): string | undefined {
    if (diagnostic === undefined || diagnostic === null) return undefined;
    if (typeof diagnostic === 'string') return diagnostic;
    try {
        return JSON.stringify(diagnostic, null, 2) ?? String(diagnostic);
    } catch {
        return String(diagnostic);
    }
}
