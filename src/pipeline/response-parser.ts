import { z } from 'zod';
import type {
    AnalysisResult,
    DataQualityWarning,
    Degradation,
    DocumentLine,
    InputDocument,
    LineReference,
    SupportingLine,
    ThemeCluster,
} from '../types/index.js';
import { lineLookup, normalizeLineText } from '../document/input-document.js';
import { deepFreeze } from '../utils/freeze.js';
import { getLogger } from '../utils/logger.js';
import { MalformedResponseError } from './errors.js';

const logger = getLogger();

/** Balanced-brace candidates tried before giving up on a reply. */
const MAX_PAYLOAD_CANDIDATES = 20;

// ─── Strict reply schema ──────────────────────────────────

const StrictLineSchema = z.object({ line: z.number().int(), text: z.string() });

const StrictReplySchema = z.object({
    unrecoverable_lines: z.array(StrictLineSchema),
    themes: z.array(
        z.object({
            label: z.string().trim().min(1),
            description: z.string(),
            confidence: z.number().min(0).max(1),
            supporting_lines: z
                .array(StrictLineSchema.extend({ fit: z.number().min(0).max(1).optional() }))
                .min(1),
        })
    ),
    unclassified_lines: z.array(StrictLineSchema),
    summary: z.string(),
    observations: z.array(z.string()),
    recommendations: z.array(z.string()),
});

type StrictReply = z.infer<typeof StrictReplySchema>;

// ─── Lenient reply schema ─────────────────────────────────

const LooseNumber = z.union([z.number(), z.string().trim().regex(/^-?\d+(?:\.\d+)?%?$/)]);

const LooseLine = z.union([
    LooseNumber,
    z.string(),
    z
        .object({
            line: LooseNumber.nullish(),
            text: z.string().nullish(),
            fit: LooseNumber.nullish(),
            confidence: LooseNumber.nullish(),
        })
        .passthrough(),
]);

const LooseStrings = z.union([z.array(z.union([z.string(), z.number()])), z.string()]);

const LooseThemeSchema = z
    .object({
        label: z.string().nullish(),
        title: z.string().nullish(),
        description: z.string().nullish(),
        confidence: LooseNumber.nullish(),
        overall_confidence: LooseNumber.nullish(),
        supporting_lines: z.array(LooseLine).nullish(),
        examples: z.array(LooseLine).nullish(),
    })
    .passthrough();

const LooseReplySchema = z
    .object({
        unrecoverable_lines: z.array(LooseLine).nullish(),
        themes: z.array(LooseThemeSchema).nullish(),
        common_ideas: z.array(LooseThemeSchema).nullish(),
        unclassified_lines: z.array(LooseLine).nullish(),
        uncategorized_lines: z.array(LooseLine).nullish(),
        summary: z.string().nullish(),
        observations: LooseStrings.nullish(),
        recommendations: LooseStrings.nullish(),
    })
    .passthrough();

type LooseReply = z.infer<typeof LooseReplySchema>;

/** Top-level fields of either reply format; a payload needs one of them. */
const ANALYSIS_KEYS = [
    'themes',
    'common_ideas',
    'unrecoverable_lines',
    'unclassified_lines',
    'uncategorized_lines',
    'summary',
] as const;
type LooseLineValue = z.infer<typeof LooseLine>;
type LooseNumberValue = z.infer<typeof LooseNumber>;

// ─── Intermediate form shared by both paths ───────────────

interface DraftLine {
    line?: number;
    text?: string;
    fit?: number;
}

interface DraftTheme {
    label: string;
    description: string;
    confidence?: number;
    lines: DraftLine[];
}

interface Draft {
    unrecoverable: DraftLine[];
    themes: DraftTheme[];
    unclassified: DraftLine[];
    summary: string;
    observations: string[];
    recommendations: string[];
}

/**
 * Collects degradations and logs each one as it happens.
 */
class DegradationLog {
    readonly entries: Degradation[] = [];

    add(kind: Degradation['kind'], detail: string): void {
        this.entries.push({ kind, detail });
        logger.warn({ kind, detail }, 'Degraded parse of generation reply');
    }
}

/**
 * Parse a generation reply into an AnalysisResult for `document`.
 *
 * 1. Strict: the reply is JSON matching the expected schema, with every
 *    line number pointing at a document line.
 * 2. Otherwise a bounded set of recovery heuristics, each recorded as a
 *    degradation (payload extraction, number coercion, field aliases,
 *    confidence clipping, dropping references to lines that do not exist).
 * 3. Partition repair: duplicates keep their first claim (themes, then
 *    unclassified, then unrecoverable); unclaimed lines become unclassified.
 *    Repairs are attached as warnings.
 *
 * Throws MalformedResponseError, with the raw text attached, when no
 * structured payload can be read.
 */
export function parseResponse(raw: string, document: InputDocument): AnalysisResult {
    const log = new DegradationLog();
    const payload = extractPayload(raw, log);
    const lookup = lineLookup(document);

    const strict = StrictReplySchema.safeParse(payload);
    let draft: Draft;
    if (strict.success && referencesExist(strict.data, lookup)) {
        draft = fromStrict(strict.data);
    } else {
        logger.debug(
            { issues: strict.success ? ['line numbers outside the document'] : strict.error.issues.length },
            'Strict parse failed, attempting recovery'
        );
        draft = fromLoose(payload, raw, log);
    }

    return assemble(draft, document, lookup, log);
}

// ─── Payload extraction ───────────────────────────────────

function extractPayload(raw: string, log: DegradationLog): object {
    const trimmed = raw.trim();
    const direct = tryParseObject(trimmed);
    if (direct !== undefined) {
        return direct;
    }

    for (const match of trimmed.matchAll(/```(?:json)?\s*([\s\S]*?)```/gi)) {
        const fenced = tryParseObject((match[1] ?? '').trim());
        if (fenced !== undefined) {
            log.add('extracted-payload', 'Read JSON from a markdown code fence');
            return fenced;
        }
    }

    for (const candidate of balancedObjects(trimmed)) {
        const parsed = tryParseObject(candidate);
        if (parsed !== undefined) {
            log.add('extracted-payload', `Stripped ${trimmed.length - candidate.length} characters of surrounding text`);
            return parsed;
        }
    }

    throw new MalformedResponseError('Reply contains no parseable JSON object', raw);
}

function tryParseObject(text: string): object | undefined {
    if (!text.startsWith('{')) return undefined;
    try {
        const value: unknown = JSON.parse(text);
        return typeof value === 'object' && value !== null && !Array.isArray(value) ? value : undefined;
    } catch {
        return undefined;
    }
}

/**
 * Yield top-level `{...}` substrings with balanced braces, skipping braces
 * inside JSON strings. Objects nested in a candidate are never tried on
 * their own, and an object that never closes ends the scan.
 */
function* balancedObjects(text: string): Generator<string> {
    let tried = 0;
    let from = text.indexOf('{');

    while (from >= 0 && tried < MAX_PAYLOAD_CANDIDATES) {
        tried++;
        let depth = 0;
        let inString = false;
        let escaped = false;
        let end = -1;

        for (let i = from; i < text.length; i++) {
            const ch = text[i];
            if (inString) {
                if (escaped) escaped = false;
                else if (ch === '\\') escaped = true;
                else if (ch === '"') inString = false;
                continue;
            }
            if (ch === '"') inString = true;
            else if (ch === '{') depth++;
            else if (ch === '}') {
                depth--;
                if (depth === 0) {
                    end = i;
                    break;
                }
            }
        }

        if (end < 0) return;
        yield text.slice(from, end + 1);
        from = text.indexOf('{', end + 1);
    }
}

// ─── Strict path ──────────────────────────────────────────

function referencesExist(reply: StrictReply, lookup: Map<number, DocumentLine>): boolean {
    const refs = [
        ...reply.unrecoverable_lines,
        ...reply.unclassified_lines,
        ...reply.themes.flatMap((theme) => theme.supporting_lines),
    ];
    return refs.every((ref) => lookup.has(ref.line));
}

function fromStrict(reply: StrictReply): Draft {
    return {
        unrecoverable: reply.unrecoverable_lines.map(({ line, text }) => ({ line, text })),
        themes: reply.themes.map((theme) => ({
            label: theme.label.trim(),
            description: theme.description,
            confidence: theme.confidence,
            lines: theme.supporting_lines.map(({ line, text, fit }) => ({ line, text, ...(fit !== undefined ? { fit } : {}) })),
        })),
        unclassified: reply.unclassified_lines.map(({ line, text }) => ({ line, text })),
        summary: reply.summary,
        observations: reply.observations,
        recommendations: reply.recommendations,
    };
}

// ─── Lenient path ─────────────────────────────────────────

function fromLoose(payload: object, raw: string, log: DegradationLog): Draft {
    if (!ANALYSIS_KEYS.some((key) => key in payload)) {
        throw new MalformedResponseError(
            `Reply has none of the analysis fields (${ANALYSIS_KEYS.join(', ')})`,
            raw
        );
    }

    const parsed = LooseReplySchema.safeParse(payload);
    if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new MalformedResponseError(`Reply does not match the analysis structure: ${issues.join('; ')}`, raw, {
            raw,
            issues,
        });
    }
    const reply = parsed.data;

    const looseThemes = pick(reply, 'themes', 'common_ideas', log) ?? defaulted([], 'themes', log);
    const themes = looseThemes.map((theme, i): DraftTheme => {
        const where = `themes[${i}]`;
        const label = (theme.label ?? theme.title)?.trim();
        if (!present(theme.label) && present(theme.title)) {
            log.add('aliased-field', `${where}: read "title" as "label"`);
        }
        if (!present(theme.confidence) && present(theme.overall_confidence)) {
            log.add('aliased-field', `${where}: read "overall_confidence" as "confidence"`);
        }
        if (!present(theme.supporting_lines) && present(theme.examples)) {
            log.add('aliased-field', `${where}: read "examples" as "supporting_lines"`);
        }
        const confidence = theme.confidence ?? theme.overall_confidence;
        const draft: DraftTheme = {
            label: label || defaulted(`Theme ${i + 1}`, `${where}.label`, log),
            description: theme.description ?? defaulted('', `${where}.description`, log),
            lines: (theme.supporting_lines ?? theme.examples ?? []).map((line, j) =>
                looseLine(line, `${where}.supporting_lines[${j}]`, log)
            ),
        };
        if (present(confidence)) {
            draft.confidence = toNumber(confidence, `${where}.confidence`, log);
        } else {
            log.add('defaulted-field', `${where}.confidence missing, derived from supporting line count`);
        }
        return draft;
    });

    const toLines = (values: LooseLineValue[], field: string): DraftLine[] =>
        values.map((value, i) => looseLine(value, `${field}[${i}]`, log));

    return {
        unrecoverable: toLines(reply.unrecoverable_lines ?? defaulted([], 'unrecoverable_lines', log), 'unrecoverable_lines'),
        themes,
        unclassified: toLines(
            pick(reply, 'unclassified_lines', 'uncategorized_lines', log) ?? defaulted([], 'unclassified_lines', log),
            'unclassified_lines'
        ),
        summary: reply.summary ?? defaulted('', 'summary', log),
        observations: looseStrings(reply.observations, 'observations', log),
        recommendations: looseStrings(reply.recommendations, 'recommendations', log),
    };
}

function pick<K extends keyof LooseReply, A extends keyof LooseReply>(
    reply: LooseReply,
    key: K,
    alias: A,
    log: DegradationLog
): LooseReply[K] | LooseReply[A] {
    if (!present(reply[key]) && present(reply[alias])) {
        log.add('aliased-field', `read "${String(alias)}" as "${String(key)}"`);
        return reply[alias];
    }
    return reply[key];
}

/** Models write `null` for fields they leave out; both count as missing. */
function present<T>(value: T | null | undefined): value is T {
    return value !== null && value !== undefined;
}

function defaulted<T>(value: T, field: string, log: DegradationLog): T {
    log.add('defaulted-field', `${field} missing, defaulted to ${JSON.stringify(value)}`);
    return value;
}

function toNumber(value: LooseNumberValue, field: string, log: DegradationLog): number {
    if (typeof value === 'number') return value;
    const parsed = Number(value.replace('%', ''));
    log.add('coerced-number', `${field}: "${value}" read as ${parsed}`);
    return parsed;
}

function looseLine(value: LooseLineValue, field: string, log: DegradationLog): DraftLine {
    if (typeof value === 'number') {
        log.add('bare-line-reference', `${field}: bare line number ${value}`);
        return { line: value };
    }
    if (typeof value === 'string') {
        if (/^-?\d+(?:\.\d+)?%?$/.test(value.trim())) {
            return { line: toNumber(value, field, log) };
        }
        return { text: value };
    }

    const line: DraftLine = {};
    if (present(value.line)) line.line = toNumber(value.line, `${field}.line`, log);
    if (present(value.text)) line.text = value.text;
    const fit = value.fit ?? value.confidence;
    if (present(fit)) line.fit = toNumber(fit, `${field}.fit`, log);
    return line;
}

function looseStrings(
    value: Array<string | number> | string | null | undefined,
    field: string,
    log: DegradationLog
): string[] {
    if (!present(value)) return defaulted([], field, log);
    if (typeof value === 'string') {
        log.add('coerced-number', `${field}: single string wrapped in a list`);
        return value.trim() ? [value] : [];
    }
    return value.map(String);
}

// ─── Resolution and partition ─────────────────────────────

/**
 * Scores above 1 and at most 100 are read as percentages; anything else
 * outside [0, 1] is clipped.
 */
function normalizeScore(value: number, field: string, log: DegradationLog): number {
    if (value >= 0 && value <= 1) return value;
    if (value > 1 && value <= 100) {
        log.add('rescaled-confidence', `${field}: ${value} read as a percentage`);
        return value / 100;
    }
    const clipped = Math.min(1, Math.max(0, value));
    log.add('clipped-confidence', `${field}: ${value} clipped to ${clipped}`);
    return clipped;
}

/**
 * Turns draft lines into references to real document lines.
 */
class LineResolver {
    private readonly byText = new Map<string, DocumentLine[]>();
    private readonly usedByText = new Set<number>();

    constructor(
        private readonly lookup: Map<number, DocumentLine>,
        document: InputDocument,
        private readonly log: DegradationLog
    ) {
        for (const line of document.lines) {
            const key = normalizeLineText(line.text);
            const bucket = this.byText.get(key) ?? [];
            bucket.push(line);
            this.byText.set(key, bucket);
        }
    }

    resolve(draft: DraftLine, field: string): SupportingLine | null {
        let target = draft.line !== undefined ? this.lookup.get(draft.line) : undefined;

        if (!target && draft.text !== undefined) {
            target = this.matchText(draft.text);
            if (target) {
                this.log.add('matched-by-text', `${field}: quote matched to line ${target.index}`);
            }
        }

        if (!target) {
            this.log.add(
                'dropped-unknown-line',
                `${field}: ${draft.line !== undefined ? `line ${draft.line}` : `"${draft.text ?? ''}"`} is not a line of the document`
            );
            return null;
        }

        if (draft.text !== undefined && draft.line !== undefined && !this.sameText(draft.text, target)) {
            this.log.add('replaced-quote', `${field}: quote for line ${target.index} replaced with the document text`);
        }

        const fit = draft.fit !== undefined ? normalizeScore(draft.fit, `${field}.fit`, this.log) : undefined;
        return { index: target.index, text: target.text, ...(fit !== undefined ? { fit } : {}) };
    }

    private sameText(quote: string, line: DocumentLine): boolean {
        return normalizeLineText(stripLinePrefix(quote).text) === normalizeLineText(line.text);
    }

    private matchText(quote: string): DocumentLine | undefined {
        const { index, text } = stripLinePrefix(quote);
        if (index !== undefined) {
            const byIndex = this.lookup.get(index);
            if (byIndex && normalizeLineText(byIndex.text) === normalizeLineText(text)) {
                return byIndex;
            }
        }

        const candidates = this.byText.get(normalizeLineText(text)) ?? [];
        const match = candidates.find((line) => !this.usedByText.has(line.index)) ?? candidates[0];
        if (match) {
            this.usedByText.add(match.index);
        }
        return match;
    }
}

/** `"[12] text"` → index 12, text "text". */
function stripLinePrefix(quote: string): { index?: number; text: string } {
    const match = /^\s*\[(\d+)\]\s*(.*)$/s.exec(quote);
    if (match?.[1] !== undefined && match[2] !== undefined) {
        return { index: Number(match[1]), text: match[2] };
    }
    return { text: quote };
}

function assemble(
    draft: Draft,
    document: InputDocument,
    lookup: Map<number, DocumentLine>,
    log: DegradationLog
): AnalysisResult {
    const resolver = new LineResolver(lookup, document, log);
    const claimed = new Set<number>();
    const duplicates = new Set<number>();

    const claim = (ref: SupportingLine | null): ref is SupportingLine => {
        if (!ref) return false;
        if (claimed.has(ref.index)) {
            duplicates.add(ref.index);
            return false;
        }
        claimed.add(ref.index);
        return true;
    };

    const themes: ThemeCluster[] = [];
    draft.themes.forEach((theme, i) => {
        const supportingLines = theme.lines
            .map((line, j) => resolver.resolve(line, `themes[${i}].supporting_lines[${j}]`))
            .filter(claim);

        if (supportingLines.length === 0) {
            log.add('removed-empty-theme', `themes[${i}] "${theme.label}" has no supporting lines left`);
            return;
        }

        const reported =
            theme.confidence !== undefined
                ? normalizeScore(theme.confidence, `themes[${i}].confidence`, log)
                : Math.min(1, supportingLines.length / 3);

        themes.push({
            label: theme.label,
            description: theme.description,
            confidence: reported,
            reportedConfidence: reported,
            supportingLines,
        });
    });

    const toReference = (ref: SupportingLine): LineReference => ({ index: ref.index, text: ref.text });

    const unclassified = draft.unclassified
        .map((line, i) => resolver.resolve(line, `unclassified_lines[${i}]`))
        .filter(claim)
        .map(toReference);

    const unrecoverable = draft.unrecoverable
        .map((line, i) => resolver.resolve(line, `unrecoverable_lines[${i}]`))
        .filter(claim)
        .map(toReference);

    const warnings: DataQualityWarning[] = [];
    if (duplicates.size > 0) {
        const lines = [...duplicates].sort((a, b) => a - b);
        warnings.push({
            kind: 'duplicate-lines',
            detail: `${lines.length} line(s) were placed in more than one bucket; the first placement was kept`,
            lines,
        });
    }

    const missing = document.lines.filter((line) => !claimed.has(line.index));
    if (missing.length > 0) {
        unclassified.push(...missing.map(({ index, text }) => ({ index, text })));
        warnings.push({
            kind: 'missing-lines',
            detail: `${missing.length} line(s) were not accounted for and were added to the unclassified lines`,
            lines: missing.map((line) => line.index),
        });
    }

    for (const warning of warnings) {
        logger.warn({ kind: warning.kind, lines: warning.lines }, 'Repaired line partition');
    }

    const byIndex = (a: LineReference, b: LineReference): number => a.index - b.index;

    return deepFreeze({
        unrecoverableLines: unrecoverable.sort(byIndex),
        themes,
        unclassifiedLines: unclassified.sort(byIndex),
        summary: {
            text: draft.summary.trim(),
            observations: draft.observations.map((s) => s.trim()).filter(Boolean),
            recommendations: draft.recommendations.map((s) => s.trim()).filter(Boolean),
        },
        quality: { degradations: log.entries, warnings },
    });
}
