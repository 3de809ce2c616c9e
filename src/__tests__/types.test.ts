import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, DEFAULT_GENERATION_CONFIG, DEFAULT_RETRY_CONFIG } from '../types/index.js';

describe('Types', () => {
    describe('DEFAULT_CONFIG', () => {
        it('should target the OpenAI API with a conservative temperature', () => {
            expect(DEFAULT_CONFIG.generation).toBe(DEFAULT_GENERATION_CONFIG);
            expect(DEFAULT_GENERATION_CONFIG.model).toBe('gpt-4');
            expect(DEFAULT_GENERATION_CONFIG.temperature).toBe(0.3);
            expect(DEFAULT_GENERATION_CONFIG.baseUrl).toBe('https://api.openai.com/v1');
        });

        it('should allow three attempts within two minutes', () => {
            expect(DEFAULT_CONFIG.retry).toBe(DEFAULT_RETRY_CONFIG);
            expect(DEFAULT_RETRY_CONFIG.maxAttempts).toBe(3);
            expect(DEFAULT_RETRY_CONFIG.deadlineMs).toBe(120000);
            expect(DEFAULT_RETRY_CONFIG.maxDelayMs).toBeGreaterThanOrEqual(DEFAULT_RETRY_CONFIG.baseDelayMs);
        });

        it('should not carry a credential', () => {
            expect('apiKey' in DEFAULT_CONFIG).toBe(false);
        });

        it('should log at info in human-readable form', () => {
            expect(DEFAULT_CONFIG.logLevel).toBe('info');
            expect(DEFAULT_CONFIG.jsonLogs).toBe(false);
        });
    });
});
