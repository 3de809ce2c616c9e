import { cosmiconfig } from 'cosmiconfig';
import { DEFAULT_CONFIG, type AppConfig, type GenerationConfig, type LogLevel, type RetryConfig } from '../types/index.js';
import { ConfigurationError } from '../pipeline/errors.js';
import { ConfigFileSchema, formatIssues, validateAnalysisConfig, type ConfigFile } from './config-schema.js';
import { getLogger } from './logger.js';

/**
 * Settings that may come from CLI flags.
 */
export interface CliOverrides {
    generation?: Partial<GenerationConfig>;
    retry?: Partial<RetryConfig>;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

/**
 * Load configuration from postmortem.config.json using cosmiconfig.
 * Returns null if no config file is found; defaults apply.
 */
async function loadConfigFile(searchFrom?: string): Promise<ConfigFile | null> {
    const explorer = cosmiconfig('postmortem', {
        searchPlaces: ['postmortem.config.json'],
    });

    const result = await explorer.search(searchFrom);
    if (!result || result.isEmpty) {
        return null;
    }

    const parsed = ConfigFileSchema.safeParse(result.config);
    if (!parsed.success) {
        const issues = formatIssues(parsed.error);
        throw new ConfigurationError(`Invalid config file ${result.filepath}: ${issues.join('; ')}`, issues);
    }

    getLogger().debug({ path: result.filepath }, 'Loaded config file');
    return parsed.data;
}

/**
 * Read relevant environment variables.
 */
function loadEnvVars(env: NodeJS.ProcessEnv): { apiKey: string; generation: Partial<GenerationConfig> } {
    const generation: Partial<GenerationConfig> = {};

    const model = env['POSTMORTEM_MODEL']?.trim();
    if (model) {
        generation.model = model;
    }
    const baseUrl = env['OPENAI_BASE_URL']?.trim();
    if (baseUrl) {
        generation.baseUrl = baseUrl;
    }

    return { apiKey: env['OPENAI_API_KEY']?.trim() ?? '', generation };
}

/**
 * Merge configuration from multiple sources and validate the result.
 * Precedence: CLI flags > environment variables > config file > defaults
 *
 * Fails with ConfigurationError when the API key is absent or a value is
 * out of range, before any generation attempt.
 */
export async function resolveConfig(
    cliFlags: CliOverrides,
    options: { env?: NodeJS.ProcessEnv; searchFrom?: string } = {}
): Promise<AppConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars(options.env ?? process.env);

    const analysis = validateAnalysisConfig({
        apiKey: envConfig.apiKey,
        generation: {
            ...DEFAULT_CONFIG.generation,
            ...fileConfig?.generation,
            ...envConfig.generation,
            ...cliFlags.generation,
        },
        retry: {
            ...DEFAULT_CONFIG.retry,
            ...fileConfig?.retry,
            ...cliFlags.retry,
        },
    });

    return Object.freeze({
        ...analysis,
        logLevel: cliFlags.logLevel ?? fileConfig?.logLevel ?? DEFAULT_CONFIG.logLevel,
        jsonLogs: cliFlags.jsonLogs ?? fileConfig?.jsonLogs ?? DEFAULT_CONFIG.jsonLogs,
    });
}
