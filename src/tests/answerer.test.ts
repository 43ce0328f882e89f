// ═══════════════════════════════════════════════════════════════════════════════
// ANSWERER TESTS — Template and LLM Strategies
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';
import {
  LlmAnswerer,
  TEMPLATE_ANSWER,
  TemplateAnswerer,
  createAnswerer,
  createOpenAiClient,
  type CompletionRequest,
} from '../retrieval/index.js';
import { loadTestConfig } from '../config/index.js';

describe('TemplateAnswerer', () => {
  it('should return the placeholder regardless of input', async () => {
    expect(await new TemplateAnswerer().answer('any context', 'any question')).toBe(TEMPLATE_ANSWER);
  });
});

describe('LlmAnswerer', () => {
  it('should send the context and question to the model', async () => {
    const requests: CompletionRequest[] = [];
    const answerer = new LlmAnswerer(async (request) => {
      requests.push(request);
      return 'Objects keep moving unless acted on.';
    });

    const answer = await answerer.answer("Newton's laws...", 'What is inertia?');

    expect(answer).toBe('Objects keep moving unless acted on.');
    expect(requests[0]?.user).toBe("Reference material:\nNewton's laws...\n\nQuestion: What is inertia?");
  });

  it('should reject an empty completion', async () => {
    const answerer = new LlmAnswerer(async () => null);

    await expect(answerer.answer('c', 'q')).rejects.toThrow('Language model returned an empty answer');
  });
});

describe('createAnswerer', () => {
  it('should default to the template strategy', () => {
    expect(createAnswerer(loadTestConfig().answerer)).toBeInstanceOf(TemplateAnswerer);
  });

  it('should build the LLM strategy when a key is configured', () => {
    const config = loadTestConfig({ answerer: { provider: 'openai', openaiApiKey: 'test-key' } });

    expect(createAnswerer(config.answerer)).toBeInstanceOf(LlmAnswerer);
  });

  it('should bound the SDK client by the default timeout and retries', () => {
    const client = createOpenAiClient(loadTestConfig().answerer, 'test-key');

    expect(client.timeout).toBe(30_000);
    expect(client.maxRetries).toBe(1);
  });

  it('should pass configured limits to the SDK client', () => {
    const config = loadTestConfig({ answerer: { timeoutMs: 5_000, maxRetries: 0 } });

    const client = createOpenAiClient(config.answerer, 'test-key');

    expect(client.timeout).toBe(5_000);
    expect(client.maxRetries).toBe(0);
  });
});
