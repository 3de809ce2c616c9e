/**
 * The instruction payload sent to the generation backend.
 */
export interface Prompt {
    readonly system: string;
    readonly user: string;
    /** Number of document lines embedded in `user` */
    readonly lineCount: number;
}

/**
 * Interface for text-generation backends (OpenAI-compatible APIs, test fakes).
 */
export interface TextGenerator {
    /** Backend name, used in logs */
    readonly name: string;

    /**
     * Send one completion request. Implementations throw the pipeline's
     * service errors (`AuthError`, `RateLimitError`, ...) and must stop
     * work when `params.signal` aborts.
     */
    generate(prompt: Prompt, params: GenerationParams): Promise<GeneratedText>;
}

/**
 * Parameters for one completion request.
 */
export interface GenerationParams {
    model: string;
    /** Sampling temperature (0.0 to 2.0) */
    temperature: number;
    maxOutputTokens: number;
    /** Per-request timeout */
    timeoutMs: number;
    signal?: AbortSignal;
}

/**
 * Text returned by a backend.
 */
export interface GeneratedText {
    text: string;
    /** Model that actually answered */
    model: string;
    usage?: {
        promptTokens: number;
        completionTokens: number;
        totalTokens: number;
    };
}

/**
 * What the GenerationClient hands to the parser.
 */
export interface RawResponse extends GeneratedText {
    /** Calls made, the successful one included */
    attempts: number;
}
