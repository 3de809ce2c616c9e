import { expect } from 'vitest';
import type {
    AnalysisResult,
    GeneratedText,
    GenerationParams,
    InputDocument,
    Prompt,
    RetryConfig,
    TextGenerator,
} from '../types/index.js';
import { createInputDocument } from '../document/input-document.js';
import { createAnalysisConfig } from '../utils/config-schema.js';

/**
 * Line numbers: 1, 2, 4, 5, 6, 7, 8 (line 3 is blank).
 */
export const NOTES = [
    '2024-03-02 10:14 UTC',
    'Deploy pipeline had no rollback step',
    '',
    'Alerts fired for 40 minutes before anyone looked',
    'Rollback took too long because it was manual',
    '----',
    'Nobody owned the pager that weekend',
    'Too many noisy alerts so people ignored them',
].join('\n');

export function notesDocument(): InputDocument {
    return createInputDocument(NOTES);
}

export interface ReplyLine {
    line: number;
    text: string;
    fit?: number;
}

export interface ReplyTheme {
    label: string;
    description: string;
    confidence: number;
    supporting_lines: ReplyLine[];
}

export interface Reply {
    unrecoverable_lines: ReplyLine[];
    themes: ReplyTheme[];
    unclassified_lines: ReplyLine[];
    summary: string;
    observations: string[];
    recommendations: string[];
}

/**
 * A reply that satisfies every rule for NOTES.
 */
export function validReply(): Reply {
    return {
        unrecoverable_lines: [
            { line: 1, text: '2024-03-02 10:14 UTC' },
            { line: 6, text: '----' },
        ],
        themes: [
            {
                label: 'Manual rollback',
                description: 'Rollbacks were missing or slow.',
                confidence: 0.8,
                supporting_lines: [
                    { line: 2, text: 'Deploy pipeline had no rollback step' },
                    { line: 5, text: 'Rollback took too long because it was manual' },
                ],
            },
            {
                label: 'Alert fatigue',
                description: 'Alerts were noisy and ignored.',
                confidence: 0.9,
                supporting_lines: [
                    { line: 4, text: 'Alerts fired for 40 minutes before anyone looked' },
                    { line: 8, text: 'Too many noisy alerts so people ignored them' },
                ],
            },
        ],
        unclassified_lines: [{ line: 7, text: 'Nobody owned the pager that weekend' }],
        summary: 'Recovery was slow because rollback was manual and alerts were ignored.',
        observations: ['Alerts were ignored for 40 minutes'],
        recommendations: ['Automate rollback', 'Tune alert thresholds'],
    };
}

/**
 * Same notes, grouped differently: one broad theme, nothing unclassified.
 */
export function alternativeReply(): Reply {
    return {
        unrecoverable_lines: [
            { line: 1, text: '2024-03-02 10:14 UTC' },
            { line: 6, text: '----' },
        ],
        themes: [
            {
                label: 'Slow incident response',
                description: 'Detection and recovery both lagged.',
                confidence: 0.7,
                supporting_lines: [
                    { line: 2, text: 'Deploy pipeline had no rollback step' },
                    { line: 4, text: 'Alerts fired for 40 minutes before anyone looked' },
                    { line: 5, text: 'Rollback took too long because it was manual' },
                    { line: 7, text: 'Nobody owned the pager that weekend' },
                    { line: 8, text: 'Too many noisy alerts so people ignored them' },
                ],
            },
        ],
        unclassified_lines: [],
        summary: 'Incident response was slow end to end.',
        observations: [],
        recommendations: ['Write a rollback runbook'],
    };
}

export const FAST_RETRY: RetryConfig = {
    maxAttempts: 3,
    baseDelayMs: 0,
    maxDelayMs: 0,
    jitterRatio: 0,
    deadlineMs: 5000,
};

export function testConfig(retry: Partial<RetryConfig> = {}) {
    return createAnalysisConfig({
        apiKey: 'test-key',
        generation: { model: 'gpt-test' },
        retry: { ...FAST_RETRY, ...retry },
    });
}

type Step = GeneratedText | Error | ((params: GenerationParams) => Promise<GeneratedText>);

/**
 * Deterministic TextGenerator that plays back a script, one step per call.
 * The last step repeats once the script runs out.
 */
export class ScriptedGenerator implements TextGenerator {
    readonly name = 'scripted';
    readonly params: GenerationParams[] = [];
    readonly prompts: Prompt[] = [];

    constructor(private readonly script: Step[]) {}

    get calls(): number {
        return this.params.length;
    }

    async generate(prompt: Prompt, params: GenerationParams): Promise<GeneratedText> {
        this.prompts.push(prompt);
        this.params.push(params);
        const step = this.script[Math.min(this.params.length, this.script.length) - 1];
        if (step === undefined) throw new Error('ScriptedGenerator has an empty script');
        if (step instanceof Error) throw step;
        if (typeof step === 'function') return step(params);
        return step;
    }
}

export function reply(value: Reply | string, model = 'fake-model'): GeneratedText {
    return { text: typeof value === 'string' ? value : JSON.stringify(value), model };
}

/**
 * Every document line appears in exactly one bucket; themes are non-empty
 * with confidence in [0, 1].
 */
export function expectValidResult(result: AnalysisResult, document: InputDocument): void {
    const indices = [
        ...result.unrecoverableLines.map((line) => line.index),
        ...result.themes.flatMap((theme) => theme.supportingLines.map((line) => line.index)),
        ...result.unclassifiedLines.map((line) => line.index),
    ].sort((a, b) => a - b);

    expect(indices).toEqual(document.lines.map((line) => line.index));

    for (const theme of result.themes) {
        expect(theme.supportingLines.length).toBeGreaterThanOrEqual(1);
        expect(theme.confidence).toBeGreaterThanOrEqual(0);
        expect(theme.confidence).toBeLessThanOrEqual(1);
    }
}

/**
 * Copy of `reply` with theme `i` patched.
 */
export function patchTheme(reply: Reply, i: number, patch: Partial<ReplyTheme>): Reply {
    return { ...reply, themes: reply.themes.map((theme, j) => (j === i ? { ...theme, ...patch } : theme)) };
}
