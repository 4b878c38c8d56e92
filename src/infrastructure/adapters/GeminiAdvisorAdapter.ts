// ============================================================================
// GEMINI ADVISOR ADAPTER - INFRASTRUCTURE LAYER
// ============================================================================

import { z } from 'zod';
import { AdvisorClientOptions, AdvisorError } from '../../core/interfaces';
import { buildSystemPrompt } from '../../domain/services/PromptBuilder';
import { AdvisorIdentity, MarketContext, Message } from '../../types';
import { BaseAdvisorAdapter } from './BaseAdvisorAdapter';

export const GEMINI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta';

const GeminiResponseSchema = z.object({
  candidates: z.array(z.object({
    content: z.object({
      parts: z.array(z.object({ text: z.string().optional() })).default([])
    }).optional(),
    finishReason: z.string().optional()
  })).min(1)
});

interface GeminiContent {
  role: 'user' | 'model';
  parts: Array<{ text: string }>;
}

export class GeminiAdvisorAdapter extends BaseAdvisorAdapter {
  private readonly apiUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(identity: AdvisorIdentity, credential: string, options: AdvisorClientOptions = {}) {
    super(identity, credential, options);

    const baseUrl = (identity.config.endpoint ?? GEMINI_BASE_URL).replace(/\/+$/, '');
    this.apiUrl = `${baseUrl}/models/${encodeURIComponent(identity.config.model)}:generateContent`;
    this.fetchImpl = options.fetch ?? fetch;

    this.logger.info('GeminiAdvisorAdapter initialized', { model: identity.config.model });
  }

  protected async complete(messages: readonly Message[], context: MarketContext, signal?: AbortSignal): Promise<string> {
    const contents: GeminiContent[] = messages.map((message) => ({
      role: message.role === 'advisor' ? 'model' : 'user',
      parts: [{ text: message.content }]
    }));

    const response = await this.fetchImpl(this.apiUrl, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-goog-api-key': this.credential
      },
      signal,
      body: JSON.stringify({
        systemInstruction: { parts: [{ text: buildSystemPrompt(context) }] },
        contents,
        generationConfig: {
          maxOutputTokens: this.identity.config.maxTokens,
          temperature: this.identity.config.temperature
        }
      })
    });

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      throw Object.assign(new Error(body || response.statusText), { status: response.status });
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw this.failure('MalformedResponse', 'Invalid JSON response from Gemini', { parseError: this.messageOf(error) });
    }

    const parsed = GeminiResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw this.failure('MalformedResponse', 'Unexpected response shape from Gemini', {
        issues: parsed.error.issues.map((issue) => issue.message)
      });
    }

    const [candidate] = parsed.data.candidates;
    const text = (candidate.content?.parts ?? [])
      .map((part) => part.text ?? '')
      .join('');

    if (!text) {
      throw this.failure('MalformedResponse', 'Gemini reply contained no text content', {
        finishReason: candidate.finishReason
      });
    }

    return text;
  }

  protected classifyError(error: unknown): AdvisorError | undefined {
    // fetch rejects with a TypeError when the connection itself fails
    if (error instanceof TypeError) {
      return this.failure('Unreachable', `Gemini is unreachable: ${error.message}`);
    }

    return super.classifyError(error);
  }
}
