import type { AnalysisResult, UserMessage } from '../types/index.js';

/**
 * Format a [0, 1] score as a whole percentage.
 */
export function percent(score: number): string {
    return `${Math.round(score * 100)}%`;
}

/**
 * Render a result as plain text, one section per view:
 * unrecoverable lines, themes, unclassified lines, summary.
 */
export function renderReport(result: AnalysisResult): string {
    const out: string[] = [];

    out.push('== Unrecoverable Lines ==');
    if (result.unrecoverableLines.length > 0) {
        for (const line of result.unrecoverableLines) {
            out.push(`  [${line.index}] ${line.text}`);
        }
    } else {
        out.push('  All lines had recoverable meaning');
    }

    out.push('', '== Common Themes ==');
    if (result.themes.length > 0) {
        for (const theme of result.themes) {
            out.push(`  ${theme.label} (Confidence: ${percent(theme.confidence)})`);
            if (theme.description) {
                out.push(`    ${theme.description}`);
            }
            for (const line of theme.supportingLines) {
                const fit = line.fit !== undefined ? ` (Fit: ${percent(line.fit)})` : '';
                out.push(`    - [${line.index}] ${line.text}${fit}`);
            }
        }
    } else {
        out.push('  No common themes identified');
    }

    out.push('', '== Unclassified Lines ==');
    if (result.unclassifiedLines.length > 0) {
        for (const line of result.unclassifiedLines) {
            out.push(`  - [${line.index}] ${line.text}`);
        }
    } else {
        out.push('  All meaningful lines were categorized');
    }

    out.push('', '== Summary & Recommendations ==');
    out.push(`  ${result.summary.text || '(no summary)'}`);
    if (result.summary.observations.length > 0) {
        out.push('', '  Key Observations:');
        out.push(...result.summary.observations.map((o) => `    - ${o}`));
    }
    if (result.summary.recommendations.length > 0) {
        out.push('', '  Recommendations:');
        out.push(...result.summary.recommendations.map((r) => `    - ${r}`));
    }

    if (result.quality.warnings.length > 0) {
        out.push('', '== Data Quality Warnings ==');
        for (const warning of result.quality.warnings) {
            out.push(`  ! ${warning.detail}: lines ${warning.lines.join(', ')}`);
        }
    }

    return out.join('\n') + '\n';
}

/**
 * Render a failure: category and hint, plus detail and diagnostic when
 * `verbose` is set.
 */
export function renderFailure(message: UserMessage, verbose = false): string {
    const out = [`✖ ${message.category}`, `  ${message.hint}`];
    if (verbose) {
        out.push('', `  Detail: ${message.detail}`);
        if (message.diagnostic) {
            out.push('  Diagnostic:', ...message.diagnostic.split('\n').map((line) => `    ${line}`));
        }
    } else {
        out.push('  (run with --verbose for details)');
    }
    return out.join('\n') + '\n';
}
