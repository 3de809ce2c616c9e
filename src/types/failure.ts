/**
 * Failure classifications, one per pipeline error type.
 */
export type FailureClassification =
    | 'empty-input'
    | 'configuration'
    | 'auth'
    | 'rate-limit'
    | 'transient-service'
    | 'fatal-service'
    | 'malformed-response'
    | 'unexpected';

/**
 * Pipeline stage a failure came from.
 */
export type PipelineStage = 'configuration' | 'prompt' | 'generation' | 'parsing' | 'derivation';

/**
 * Created on any pipeline failure, consumed by the error reporter.
 */
export interface FailureRecord {
    readonly classification: FailureClassification;
    readonly stage: PipelineStage;
    /** Human-readable detail */
    readonly detail: string;
    /** Raw payload for diagnostics (reply text, HTTP body, validation issues) */
    readonly diagnostic?: unknown;
}

/**
 * What the presentation layer shows for a failure.
 */
export interface UserMessage {
    /** Short category label */
    readonly category: string;
    /** What the user can do about it */
    readonly hint: string;
    readonly detail: string;
    /** Pretty-printed diagnostic, shown on demand */
    readonly diagnostic?: string;
}
