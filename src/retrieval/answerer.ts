// ═══════════════════════════════════════════════════════════════════════════════
// ANSWERER — Context + Question → Answer Text
// ═══════════════════════════════════════════════════════════════════════════════
//
// The retrieval pipeline treats answer generation as opaque. Two strategies:
//   template  fixed placeholder, no external calls
//   openai    chat completion over the assembled context
//
// ═══════════════════════════════════════════════════════════════════════════════

import OpenAI from 'openai';
import type { KnowledgeConfig } from '../config/index.js';
import { loggers } from '../observability/logging/index.js';

export interface Answerer {
  /** Rejects on failure; the orchestrator reports it as an errored answer */
  answer(context: string, question: string): Promise<string>;
}

// ─────────────────────────────────────────────────────────────────────────────────
// TEMPLATE
// ─────────────────────────────────────────────────────────────────────────────────

export const TEMPLATE_ANSWER = 'Answer based on the context';

export class TemplateAnswerer implements Answerer {
  async answer(_context: string, _question: string): Promise<string> {
    return TEMPLATE_ANSWER;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// LLM
// ─────────────────────────────────────────────────────────────────────────────────

const ANSWER_PROMPT = `You answer study questions about a subject sector.
Use only the reference material provided. If it does not cover the question, say so briefly.`;

export interface CompletionRequest {
  readonly system: string;
  readonly user: string;
}

/** Returns the completion text, or null when the model produced none */
export type CompletionFn = (request: CompletionRequest) => Promise<string | null>;

export function openAiCompletion(client: OpenAI, model: string, maxTokens: number): CompletionFn {
  return async ({ system, user }) => {
    const response = await client.chat.completions.create({
      model,
      messages: [
        { role: 'system', content: system },
        { role: 'user', content: user },
      ],
      max_tokens: maxTokens,
      temperature: 0.2,
    });
    return response.choices[0]?.message?.content?.trim() ?? null;
  };
}

export class LlmAnswerer implements Answerer {
  constructor(private readonly complete: CompletionFn) {}

  async answer(context: string, question: string): Promise<string> {
    const startedAt = Date.now();
    const content = await this.complete({
      system: ANSWER_PROMPT,
      user: `Reference material:\n${context}\n\nQuestion: ${question}`,
    });

    loggers.llm.debug('Completion received', {
      durationMs: Date.now() - startedAt,
      empty: content === null || content === '',
    });

    if (content === null || content === '') {
      throw new Error('Language model returned an empty answer');
    }
    return content;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// FACTORY
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * SDK client bounded by the configured timeout and retry count.
 */
export function createOpenAiClient(config: KnowledgeConfig['answerer'], apiKey: string): OpenAI {
  return new OpenAI({ apiKey, timeout: config.timeoutMs, maxRetries: config.maxRetries });
}

export function createAnswerer(config: KnowledgeConfig['answerer']): Answerer {
  if (config.provider === 'openai' && config.openaiApiKey) {
    const client = createOpenAiClient(config, config.openaiApiKey);
    loggers.llm.info('Using OpenAI answerer', { model: config.model, timeoutMs: config.timeoutMs });
    return new LlmAnswerer(openAiCompletion(client, config.model, config.maxTokens));
  }
  return new TemplateAnswerer();
}
