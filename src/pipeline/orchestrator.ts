import type {
    AnalysisConfig,
    AnalysisResult,
    InputDocument,
    PipelineStage,
    SupportingLine,
    TextGenerator,
    ThemeCluster,
} from '../types/index.js';
import { GenerationClient, type GenerationClientOptions } from '../generation/generation-client.js';
import { validateAnalysisConfig } from '../utils/config-schema.js';
import { deepFreeze } from '../utils/freeze.js';
import { getLogger } from '../utils/logger.js';
import { AnalysisFailure, MalformedResponseError, toFailureRecord } from './errors.js';
import { buildPrompt } from './prompt-builder.js';
import { parseResponse } from './response-parser.js';

const logger = getLogger();

/** Supporting lines needed before a theme can keep its full confidence. */
export const CORROBORATION_TARGET = 3;

/**
 * Creates the backend from a validated config. Lets the CLI pick
 * OpenAiGenerator while tests pass a fake directly.
 */
export type GeneratorFactory = (config: AnalysisConfig) => TextGenerator;

/**
 * Main analysis pipeline. Runs every stage in order:
 *
 * 1. Validate configuration (credential, ranges)
 * 2. Build the prompt
 * 3. Generate, with retries inside GenerationClient
 * 4. Parse and repair the reply
 * 5. Derive secondary fields and re-verify invariants
 *
 * Any failure is raised as an AnalysisFailure carrying a FailureRecord.
 * Nothing is retried here.
 */
export class AnalysisOrchestrator {
    private readonly createGenerator: GeneratorFactory;

    constructor(
        generator: TextGenerator | GeneratorFactory,
        private readonly clientOptions: GenerationClientOptions = {}
    ) {
        this.createGenerator = typeof generator === 'function' ? generator : () => generator;
    }

    /**
     * Run the full pipeline over one document.
     *
     * Two runs over the same document may group lines differently; both
     * satisfy the partition and confidence invariants.
     */
    async analyze(
        document: InputDocument,
        config: AnalysisConfig,
        options: { deadlineMs?: number } = {}
    ): Promise<AnalysisResult> {
        const startTime = Date.now();

        const validated = stage('configuration', () => validateAnalysisConfig(config));
        const prompt = stage('prompt', () => buildPrompt(document));
        logger.info({ lines: prompt.lineCount, model: validated.generation.model }, 'Starting analysis');

        const raw = await stageAsync('generation', () => {
            const client = new GenerationClient(this.createGenerator(validated), validated, this.clientOptions);
            return client.generate(prompt, options);
        });

        const parsed = stage('parsing', () => parseResponse(raw.text, document));
        const result = stage('derivation', () =>
            deriveResult(parsed, document, {
                model: raw.model,
                attempts: raw.attempts,
                durationMs: Date.now() - startTime,
            })
        );

        logger.info(
            {
                themes: result.themes.length,
                unrecoverable: result.unrecoverableLines.length,
                unclassified: result.unclassifiedLines.length,
                degradations: result.quality.degradations.length,
                warnings: result.quality.warnings.length,
                durationMs: result.run?.durationMs,
            },
            'Analysis complete'
        );
        return result;
    }
}

function stage<T>(name: PipelineStage, run: () => T): T {
    try {
        return run();
    } catch (error) {
        throw fail(error, name);
    }
}

async function stageAsync<T>(name: PipelineStage, run: () => Promise<T>): Promise<T> {
    try {
        return await run();
    } catch (error) {
        throw fail(error, name);
    }
}

function fail(error: unknown, name: PipelineStage): AnalysisFailure {
    if (error instanceof AnalysisFailure) return error;
    const record = toFailureRecord(error, name);
    logger.error({ classification: record.classification, stage: name, detail: record.detail }, 'Analysis failed');
    return new AnalysisFailure(record, { cause: error });
}

/**
 * Merge same-label themes, normalize confidence against evidence and
 * re-verify the result invariants.
 */
export function deriveResult(
    parsed: AnalysisResult,
    document: InputDocument,
    run: { model: string; attempts: number; durationMs: number }
): AnalysisResult {
    const themes = mergeThemes(parsed.themes).map((theme) => ({
        ...theme,
        confidence: normalizeConfidence(theme),
    }));

    const result: AnalysisResult = {
        unrecoverableLines: parsed.unrecoverableLines,
        themes,
        unclassifiedLines: parsed.unclassifiedLines,
        summary: parsed.summary,
        quality: parsed.quality,
        run,
    };

    assertInvariants(result, document);
    return deepFreeze(result);
}

/**
 * Themes whose labels match (ignoring case and surrounding space) are
 * merged into the first one; the merged reported confidence is the
 * line-weighted mean.
 */
export function mergeThemes(themes: readonly ThemeCluster[]): ThemeCluster[] {
    const merged = new Map<string, ThemeCluster>();

    for (const theme of themes) {
        const key = theme.label.trim().toLowerCase();
        const existing = merged.get(key);
        if (!existing) {
            merged.set(key, theme);
            continue;
        }

        const supportingLines: SupportingLine[] = [...existing.supportingLines, ...theme.supportingLines];
        const reported =
            (existing.reportedConfidence * existing.supportingLines.length +
                theme.reportedConfidence * theme.supportingLines.length) /
            supportingLines.length;

        logger.debug({ label: existing.label, merged: theme.label }, 'Merged duplicate theme');
        merged.set(key, {
            label: existing.label,
            description: existing.description || theme.description,
            confidence: reported,
            reportedConfidence: reported,
            supportingLines,
        });
    }

    return [...merged.values()];
}

/**
 * Evidence-weighted confidence: the mean per-line fit when every line has
 * one (otherwise the reported confidence), scaled down when fewer than
 * CORROBORATION_TARGET lines support the theme.
 */
export function normalizeConfidence(theme: ThemeCluster): number {
    const fits = theme.supportingLines.map((line) => line.fit).filter((fit): fit is number => fit !== undefined);
    const base =
        fits.length > 0 && fits.length === theme.supportingLines.length
            ? fits.reduce((sum, fit) => sum + fit, 0) / fits.length
            : theme.reportedConfidence;

    const corroboration = Math.min(1, theme.supportingLines.length / CORROBORATION_TARGET);
    const confidence = Math.round(base * corroboration * 10000) / 10000;
    return Math.min(1, Math.max(0, confidence));
}

/**
 * Every document line in exactly one bucket; every theme non-empty with
 * confidence in [0, 1].
 */
export function assertInvariants(result: AnalysisResult, document: InputDocument): void {
    const seen = new Map<number, number>();
    const count = (index: number): void => {
        seen.set(index, (seen.get(index) ?? 0) + 1);
    };

    result.unrecoverableLines.forEach((line) => count(line.index));
    result.unclassifiedLines.forEach((line) => count(line.index));
    for (const theme of result.themes) {
        if (theme.supportingLines.length === 0) {
            throw new MalformedResponseError(`Theme "${theme.label}" has no supporting lines`, '');
        }
        if (!(theme.confidence >= 0 && theme.confidence <= 1)) {
            throw new MalformedResponseError(`Theme "${theme.label}" has confidence ${theme.confidence}`, '');
        }
        theme.supportingLines.forEach((line) => count(line.index));
    }

    const problems: string[] = [];
    for (const line of document.lines) {
        const times = seen.get(line.index) ?? 0;
        if (times !== 1) problems.push(`line ${line.index} appears ${times} times`);
        seen.delete(line.index);
    }
    for (const index of seen.keys()) {
        problems.push(`line ${index} is not in the document`);
    }

    if (problems.length > 0) {
        throw new MalformedResponseError(`Line partition violated: ${problems.join(', ')}`, '', problems);
    }
}
