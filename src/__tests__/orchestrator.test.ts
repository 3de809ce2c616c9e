import { describe, it, expect } from 'vitest';
import {
    AnalysisOrchestrator,
    assertInvariants,
    deriveResult,
    mergeThemes,
    normalizeConfidence,
} from '../pipeline/orchestrator.js';
import { parseResponse } from '../pipeline/response-parser.js';
import { AnalysisFailure, AuthError, MalformedResponseError, TransientServiceError } from '../pipeline/errors.js';
import { createInputDocument } from '../document/input-document.js';
import type { AnalysisConfig, ThemeCluster } from '../types/index.js';
import {
    ScriptedGenerator,
    alternativeReply,
    expectValidResult,
    notesDocument,
    patchTheme,
    reply,
    testConfig,
    validReply,
} from './helpers.js';

const doc = notesDocument();

async function failureOf(run: Promise<unknown>): Promise<AnalysisFailure> {
    const error = await run.catch((e: unknown) => e);
    if (!(error instanceof AnalysisFailure)) {
        throw new Error(`Expected AnalysisFailure, got ${String(error)}`);
    }
    return error;
}

function theme(label: string, confidence: number, lines: Array<{ index: number; fit?: number }>): ThemeCluster {
    return {
        label,
        description: `${label} description`,
        confidence,
        reportedConfidence: confidence,
        supportingLines: lines.map((line) => ({ text: `line ${line.index}`, ...line })),
    };
}

describe('AnalysisOrchestrator', () => {
    it('should produce a valid result with run info', async () => {
        const generator = new ScriptedGenerator([reply(validReply())]);
        const result = await new AnalysisOrchestrator(generator).analyze(doc, testConfig());

        expectValidResult(result, doc);
        expect(result.run).toMatchObject({ model: 'fake-model', attempts: 1 });
        expect(result.themes.map((t) => [t.label, t.confidence])).toEqual([
            ['Manual rollback', 0.5333],
            ['Alert fatigue', 0.6],
        ]);
        expect(generator.calls).toBe(1);
        expect(generator.prompts[0]?.lineCount).toBe(7);
    });

    it('should fail on empty input before any generation call', async () => {
        const generator = new ScriptedGenerator([reply(validReply())]);
        const failure = await failureOf(new AnalysisOrchestrator(generator).analyze(createInputDocument('  \n \n'), testConfig()));

        expect(failure.record).toMatchObject({ classification: 'empty-input', stage: 'prompt' });
        expect(generator.calls).toBe(0);
    });

    it('should fail on a missing credential before any generation call', async () => {
        const generator = new ScriptedGenerator([reply(validReply())]);
        const config: AnalysisConfig = { ...testConfig(), apiKey: '' };
        const failure = await failureOf(new AnalysisOrchestrator(generator).analyze(doc, config));

        expect(failure.record.classification).toBe('configuration');
        expect(failure.record.detail).toContain('OPENAI_API_KEY');
        expect(generator.calls).toBe(0);
    });

    it('should succeed after transient failures within the attempt budget', async () => {
        const generator = new ScriptedGenerator([
            new TransientServiceError('HTTP 502'),
            new TransientServiceError('HTTP 503'),
            reply(validReply()),
        ]);
        const result = await new AnalysisOrchestrator(generator).analyze(doc, testConfig({ maxAttempts: 3 }));

        expect(result.run?.attempts).toBe(3);
        expectValidResult(result, doc);
    });

    it('should report exhausted retries as a transient failure', async () => {
        const generator = new ScriptedGenerator([new TransientServiceError('HTTP 503')]);
        const failure = await failureOf(new AnalysisOrchestrator(generator).analyze(doc, testConfig({ maxAttempts: 2 })));

        expect(failure.record).toMatchObject({ classification: 'transient-service', stage: 'generation' });
        expect(failure.cause).toBeInstanceOf(TransientServiceError);
        expect(generator.calls).toBe(2);
    });

    it('should propagate auth failures unchanged', async () => {
        const generator = new ScriptedGenerator([new AuthError('Credential rejected: bad key')]);
        const failure = await failureOf(new AnalysisOrchestrator(generator).analyze(doc, testConfig()));

        expect(failure.record).toEqual({ classification: 'auth', stage: 'generation', detail: 'Credential rejected: bad key' });
        expect(failure.cause).toBeInstanceOf(AuthError);
    });

    it('should attach the raw reply to malformed-response failures', async () => {
        const generator = new ScriptedGenerator([reply('no json here')]);
        const failure = await failureOf(new AnalysisOrchestrator(generator).analyze(doc, testConfig()));

        expect(failure.record).toMatchObject({ classification: 'malformed-response', stage: 'parsing', diagnostic: 'no json here' });
        expect(failure.cause).toBeInstanceOf(MalformedResponseError);
        expect(generator.calls).toBe(1);
    });

    it('should accept a generator factory', async () => {
        const generator = new ScriptedGenerator([reply(validReply())]);
        const seen: AnalysisConfig[] = [];
        const orchestrator = new AnalysisOrchestrator((config) => {
            seen.push(config);
            return generator;
        });

        await orchestrator.analyze(doc, testConfig());
        expect(seen[0]?.generation.model).toBe('gpt-test');
    });

    it('should hold the invariants across different groupings of the same notes', async () => {
        const orchestrator = new AnalysisOrchestrator(new ScriptedGenerator([reply(validReply()), reply(alternativeReply())]));

        const first = await orchestrator.analyze(doc, testConfig());
        const second = await orchestrator.analyze(doc, testConfig());

        expect(first.themes.map((t) => t.label)).not.toEqual(second.themes.map((t) => t.label));
        expectValidResult(first, doc);
        expectValidResult(second, doc);
    });
});

describe('normalizeConfidence', () => {
    it('should scale down themes with fewer than three lines', () => {
        expect(normalizeConfidence(theme('A', 0.9, [{ index: 1 }]))).toBe(0.3);
    });

    it('should keep the reported confidence with three or more lines', () => {
        expect(normalizeConfidence(theme('A', 0.9, [{ index: 1 }, { index: 2 }, { index: 3 }, { index: 4 }]))).toBe(0.9);
    });

    it('should use the mean fit when every line has one', () => {
        const t = theme('A', 0.2, [
            { index: 1, fit: 0.8 },
            { index: 2, fit: 0.95 },
        ]);
        expect(normalizeConfidence(t)).toBe(0.5833);
    });

    it('should ignore fits unless every line has one', () => {
        const t = theme('A', 0.6, [{ index: 1, fit: 1 }, { index: 2 }, { index: 3 }]);
        expect(normalizeConfidence(t)).toBe(0.6);
    });
});

describe('mergeThemes', () => {
    it('should merge labels that differ only in case and spacing', () => {
        const merged = mergeThemes([
            theme('Alert fatigue', 0.8, [{ index: 1 }, { index: 2 }]),
            theme('Manual rollback', 0.5, [{ index: 3 }]),
            theme(' alert FATIGUE', 0.5, [{ index: 4 }]),
        ]);

        expect(merged.map((t) => t.label)).toEqual(['Alert fatigue', 'Manual rollback']);
        expect(merged[0]?.supportingLines.map((l) => l.index)).toEqual([1, 2, 4]);
        expect(merged[0]?.reportedConfidence).toBeCloseTo(0.7);
    });
});

describe('deriveResult', () => {
    it('should merge, normalize and freeze', () => {
        const raw = JSON.stringify(patchTheme(patchTheme(validReply(), 0, { label: 'Rollback' }), 1, { label: 'rollback' }));
        const result = deriveResult(parseResponse(raw, doc), doc, { model: 'm', attempts: 1, durationMs: 5 });

        expect(result.themes).toHaveLength(1);
        expect(result.themes[0]?.supportingLines.map((l) => l.index)).toEqual([2, 5, 4, 8]);
        expect(result.themes[0]?.confidence).toBeCloseTo(0.85);
        expect(Object.isFrozen(result.themes[0])).toBe(true);
        expectValidResult(result, doc);
    });
});

describe('assertInvariants', () => {
    it('should reject a result that misses a line', () => {
        const parsed = parseResponse(JSON.stringify(validReply()), doc);
        const broken = { ...parsed, unclassifiedLines: [] };
        expect(() => assertInvariants(broken, doc)).toThrow('Line partition violated: line 7 appears 0 times');
    });

    it('should reject an empty theme', () => {
        const parsed = parseResponse(JSON.stringify(validReply()), doc);
        const broken = { ...parsed, themes: [theme('Empty', 0.5, [])] };
        expect(() => assertInvariants(broken, doc)).toThrow('Theme "Empty" has no supporting lines');
    });
});
