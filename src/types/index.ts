/**
 * Barrel export for all shared types.
 */
export type { DocumentLine, InputDocument } from './document.js';
export type {
    LineReference,
    UnrecoverableLine,
    UnclassifiedLine,
    SupportingLine,
    ThemeCluster,
    AnalysisSummary,
    Degradation,
    DataQualityWarning,
    ResultQuality,
    RunInfo,
    AnalysisResult,
} from './analysis.js';
export type { Prompt, TextGenerator, GenerationParams, GeneratedText, RawResponse } from './generator.js';
export { DEFAULT_CONFIG, DEFAULT_GENERATION_CONFIG, DEFAULT_RETRY_CONFIG } from './config.js';
export type { LogLevel, GenerationConfig, RetryConfig, AnalysisConfig, AppConfig } from './config.js';
export type { FailureClassification, PipelineStage, FailureRecord, UserMessage } from './failure.js';
