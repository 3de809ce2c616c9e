/**
 * Reference to one document line. `text` always holds the document's own
 * text for that line, never the generator's paraphrase of it.
 */
export interface LineReference {
    readonly index: number;
    readonly text: string;
}

/** A line with no extractable meaning (timestamps, separators, boilerplate). */
export type UnrecoverableLine = LineReference;

/** A meaningful line that no theme absorbed. */
export type UnclassifiedLine = LineReference;

/**
 * A line quoted as evidence for a theme.
 */
export interface SupportingLine extends LineReference {
    /** How well this line fits the theme (0.0 to 1.0), when the generator gave one */
    readonly fit?: number;
}

/**
 * A recurring lesson or pattern across the notes.
 */
export interface ThemeCluster {
    /** Short label, e.g. "Alert fatigue" */
    readonly label: string;
    readonly description: string;
    /** Evidence-weighted confidence (0.0 to 1.0) */
    readonly confidence: number;
    /** Confidence as the generator stated it, after clipping to [0, 1] */
    readonly reportedConfidence: number;
    /** Never empty */
    readonly supportingLines: readonly SupportingLine[];
}

export interface AnalysisSummary {
    readonly text: string;
    readonly observations: readonly string[];
    readonly recommendations: readonly string[];
}

/**
 * A recovery heuristic the parser had to apply to read the reply.
 */
export interface Degradation {
    readonly kind:
        | 'extracted-payload'
        | 'aliased-field'
        | 'defaulted-field'
        | 'coerced-number'
        | 'bare-line-reference'
        | 'matched-by-text'
        | 'rescaled-confidence'
        | 'clipped-confidence'
        | 'dropped-unknown-line'
        | 'replaced-quote'
        | 'removed-empty-theme';
    readonly detail: string;
}

/**
 * A structural repair made to keep the line partition whole.
 */
export interface DataQualityWarning {
    readonly kind: 'missing-lines' | 'duplicate-lines';
    readonly detail: string;
    readonly lines: readonly number[];
}

export interface ResultQuality {
    readonly degradations: readonly Degradation[];
    readonly warnings: readonly DataQualityWarning[];
}

export interface RunInfo {
    readonly model: string;
    /** Generation calls made, retries included */
    readonly attempts: number;
    readonly durationMs: number;
}

/**
 * Final, validated output of one pipeline run.
 *
 * The unrecoverable lines, every theme's supporting lines and the
 * unclassified lines together cover each document line exactly once.
 */
export interface AnalysisResult {
    readonly unrecoverableLines: readonly UnrecoverableLine[];
    readonly themes: readonly ThemeCluster[];
    readonly unclassifiedLines: readonly UnclassifiedLine[];
    readonly summary: AnalysisSummary;
    readonly quality: ResultQuality;
    /** Set by the orchestrator; absent on a bare parse */
    readonly run?: RunInfo;
}
