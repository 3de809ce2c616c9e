import type { DocumentLine, InputDocument } from '../types/index.js';

/**
 * Split raw notes into an InputDocument.
 *
 * Blank lines are skipped but still counted, so `index` matches the line
 * number an editor shows. Handles \n, \r\n and lone \r endings and a leading
 * byte-order mark.
 */
export function createInputDocument(source: string): InputDocument {
    const text = source.startsWith('\uFEFF') ? source.slice(1) : source;
    const lines: DocumentLine[] = [];

    text.split(/\r\n|\r|\n/).forEach((raw, i) => {
        const trimmed = raw.trimEnd();
        if (trimmed.trim().length > 0) {
            lines.push(Object.freeze({ index: i + 1, text: trimmed }));
        }
    });

    return Object.freeze({ source, lines: Object.freeze(lines) });
}

/**
 * Whether the document has no content at all.
 */
export function isEmptyDocument(document: InputDocument): boolean {
    return document.lines.length === 0 || document.source.trim().length === 0;
}

/**
 * Index → line lookup for a document.
 */
export function lineLookup(document: InputDocument): Map<number, DocumentLine> {
    return new Map(document.lines.map((line) => [line.index, line]));
}

/**
 * Collapse whitespace and case so quotes can be compared with document lines.
 */
export function normalizeLineText(text: string): string {
    return text.replace(/\s+/g, ' ').trim().toLowerCase();
}
