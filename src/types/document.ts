/**
 * A single non-blank line of the uploaded post-mortem notes.
 */
export interface DocumentLine {
    /** 1-based line number in the original text */
    readonly index: number;
    /** Line text with trailing whitespace removed */
    readonly text: string;
}

/**
 * The raw notes as the pipeline sees them. Immutable once created.
 */
export interface InputDocument {
    /** Original text, untouched */
    readonly source: string;
    /** Non-blank lines in document order */
    readonly lines: readonly DocumentLine[];
}
