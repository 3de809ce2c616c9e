import type { InputDocument, Prompt } from '../types/index.js';
import { isEmptyDocument } from '../document/input-document.js';
import { EmptyInputError } from './errors.js';

export const SYSTEM_PROMPT =
    'You are an expert post-mortem analyst. You answer with a single JSON object and nothing else.';

/**
 * Literal description of the reply the parser accepts.
 */
export const OUTPUT_SCHEMA_DESCRIPTION = `{
  "unrecoverable_lines": [ { "line": <integer line number>, "text": <string, the line verbatim> } ],
  "themes": [
    {
      "label": <string, 2-6 words>,
      "description": <string, one or two sentences>,
      "confidence": <number between 0 and 1>,
      "supporting_lines": [ { "line": <integer>, "text": <string>, "fit": <number between 0 and 1> } ]
    }
  ],
  "unclassified_lines": [ { "line": <integer>, "text": <string> } ],
  "summary": <string, a concise synthesis>,
  "observations": [ <string> ],
  "recommendations": [ <string> ]
}`;

const RULES = [
    'Every numbered line above must appear exactly once, in exactly one of: "unrecoverable_lines", the "supporting_lines" of one theme, or "unclassified_lines".',
    'Put lines with no extractable meaning (timestamps, separators, boilerplate, noise) in "unrecoverable_lines".',
    'A theme groups lines that express the same recurring lesson or pattern. Every theme needs at least one supporting line.',
    'Meaningful lines that fit no theme go in "unclassified_lines".',
    '"confidence" reflects how strongly the supporting lines justify the theme: few or weak lines mean low confidence.',
    'Use the line numbers exactly as given. Do not invent, merge or renumber lines.',
    'Respond with the JSON object only: no markdown fences, no commentary.',
];

/**
 * Assemble the instruction payload for one document.
 *
 * Each line is sent as `[n] text`, where n is its line number in the
 * uploaded file.
 */
export function buildPrompt(document: InputDocument): Prompt {
    if (isEmptyDocument(document)) {
        throw new EmptyInputError('Input document is empty or contains only whitespace');
    }

    const numbered = document.lines.map((line) => `[${line.index}] ${line.text}`).join('\n');

    const user = [
        'Analyze these post-mortem notes. Each line is prefixed with its line number in brackets.',
        '',
        '<notes>',
        numbered,
        '</notes>',
        '',
        'Reply with JSON of exactly this structure:',
        OUTPUT_SCHEMA_DESCRIPTION,
        '',
        'Rules:',
        ...RULES.map((rule, i) => `${i + 1}. ${rule}`),
    ].join('\n');

    return Object.freeze({ system: SYSTEM_PROMPT, user, lineCount: document.lines.length });
}
