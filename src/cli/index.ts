#!/usr/bin/env node
import { readFileSync } from 'node:fs';
import { Command, InvalidArgumentError } from 'commander';
import { resolveConfig, type CliOverrides } from '../utils/config.js';
import { initLogger, getLogger, parseLogLevel } from '../utils/logger.js';
import { createInputDocument } from '../document/input-document.js';
import { buildPrompt } from '../pipeline/prompt-builder.js';
import { AnalysisOrchestrator } from '../pipeline/orchestrator.js';
import { describe } from '../pipeline/error-reporter.js';
import { OpenAiGenerator } from '../generation/openai-generator.js';
import { renderFailure, renderReport } from '../report/text-report.js';
import type { LogLevel } from '../types/index.js';

const VERSION = '1.0.0';

const program = new Command();

program
    .name('postmortem')
    .description('Find recurring themes, noise and leftovers in free-text post-mortem notes.')
    .version(VERSION);

function toNumber(value: string): number {
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
        throw new InvalidArgumentError('Not a number.');
    }
    return parsed;
}

function toLogLevel(value: string): LogLevel {
    const level = parseLogLevel(value);
    if (!level) {
        throw new InvalidArgumentError('Expected error | warn | info | debug | silent.');
    }
    return level;
}

function readNotes(file: string): string {
    return readFileSync(file, 'utf-8');
}

interface AnalyzeOptions {
    model?: string;
    temperature?: number;
    maxTokens?: number;
    maxAttempts?: number;
    deadline?: number;
    json: boolean;
    verbose: boolean;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

// ─── ANALYZE command ──────────────────────────────────────

program
    .command('analyze')
    .description('Analyze a post-mortem notes file')
    .argument('<file>', 'UTF-8 text file with the notes')
    .option('-m, --model <model>', 'Model identifier (overrides POSTMORTEM_MODEL)')
    .option('-t, --temperature <n>', 'Sampling temperature, 0 to 2', toNumber)
    .option('--max-tokens <n>', 'Maximum reply size in tokens', toNumber)
    .option('--max-attempts <n>', 'Generation attempts, retries included', toNumber)
    .option('--deadline <ms>', 'Upper bound on total time, retries included', toNumber)
    .option('--json', 'Print the result as JSON', false)
    .option('-v, --verbose', 'Show full diagnostics on failure', false)
    .option('--log-level <level>', 'Log level: debug | info | warn | error | silent', toLogLevel)
    .option('--json-logs', 'Output JSON logs')
    .action(async (file: string, opts: AnalyzeOptions) => {
        const flags: CliOverrides = {
            generation: {
                ...(opts.model !== undefined ? { model: opts.model } : {}),
                ...(opts.temperature !== undefined ? { temperature: opts.temperature } : {}),
                ...(opts.maxTokens !== undefined ? { maxOutputTokens: opts.maxTokens } : {}),
            },
            retry: {
                ...(opts.maxAttempts !== undefined ? { maxAttempts: opts.maxAttempts } : {}),
                ...(opts.deadline !== undefined ? { deadlineMs: opts.deadline } : {}),
            },
            ...(opts.logLevel !== undefined ? { logLevel: opts.logLevel } : {}),
            ...(opts.jsonLogs !== undefined ? { jsonLogs: opts.jsonLogs } : {}),
        };

        try {
            const config = await resolveConfig(flags);
            initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });

            const document = createInputDocument(readNotes(file));
            getLogger().info({ file, lines: document.lines.length }, 'Loaded notes');

            const orchestrator = new AnalysisOrchestrator(
                (validated) => new OpenAiGenerator({ apiKey: validated.apiKey, baseUrl: validated.generation.baseUrl })
            );
            const result = await orchestrator.analyze(document, config);

            process.stdout.write(opts.json ? JSON.stringify(result, null, 2) + '\n' : renderReport(result));
        } catch (error) {
            process.stderr.write(renderFailure(describe(error), opts.verbose));
            process.exitCode = 1;
        }
    });

// ─── PROMPT command ───────────────────────────────────────

program
    .command('prompt')
    .description('Print the prompt that would be sent for a notes file, without calling the backend')
    .argument('<file>', 'UTF-8 text file with the notes')
    .action((file: string) => {
        try {
            const prompt = buildPrompt(createInputDocument(readNotes(file)));
            process.stdout.write(`--- system ---\n${prompt.system}\n\n--- user ---\n${prompt.user}\n`);
        } catch (error) {
            process.stderr.write(renderFailure(describe(error), true));
            process.exitCode = 1;
        }
    });

await program.parseAsync();
