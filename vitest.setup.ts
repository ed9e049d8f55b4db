/**
 * Vitest Setup File
 *
 * Global test setup. Keeps the suite independent of the developer's shell.
 */

process.env.NODE_ENV = 'test';
process.env.OPENAI_API_KEY = 'test-openai-key';
delete process.env.DATABASE_URL;
delete process.env.ANTHROPIC_API_KEY;
delete process.env.COHERE_API_KEY;
delete process.env.USE_LOCAL_LLM;
