// ============================================================================
// OPENAI-COMPATIBLE ADVISOR ADAPTER - INFRASTRUCTURE LAYER
// ============================================================================

import OpenAI from 'openai';
import { z } from 'zod';
import { AdvisorClientOptions, AdvisorError } from '../../core/interfaces';
import { buildSystemPrompt } from '../../domain/services/PromptBuilder';
import { AdvisorIdentity, MarketContext, Message } from '../../types';
import { BaseAdvisorAdapter } from './BaseAdvisorAdapter';

export interface ChatCompletionsApi {
  create(
    body: OpenAI.ChatCompletionCreateParamsNonStreaming,
    options?: { signal?: AbortSignal; timeout?: number }
  ): PromiseLike<unknown>;
}

// xAI serves Grok over the OpenAI chat completions contract
export const GROK_BASE_URL = 'https://api.x.ai/v1';

const ChatCompletionResponseSchema = z.object({
  choices: z.array(z.object({
    message: z.object({
      content: z.string().nullable().optional()
    })
  })).min(1)
});

const DEFAULT_MAX_TOKENS = 2048;

/**
 * Adapter for providers speaking the OpenAI chat completions wire format:
 * OpenAI itself and Grok.
 */
export class OpenAIAdvisorAdapter extends BaseAdvisorAdapter {
  private readonly completions: ChatCompletionsApi;

  constructor(
    identity: AdvisorIdentity,
    credential: string,
    options: AdvisorClientOptions = {},
    completions?: ChatCompletionsApi
  ) {
    super(identity, credential, options);

    const baseURL = identity.config.endpoint ?? (identity.provider === 'grok' ? GROK_BASE_URL : undefined);
    this.completions = completions ?? new OpenAI({
      apiKey: credential,
      baseURL,
      timeout: identity.config.timeoutMs,
      maxRetries: 0
    }).chat.completions;

    this.logger.info('OpenAIAdvisorAdapter initialized', {
      provider: identity.provider,
      model: identity.config.model,
      baseURL: baseURL ?? 'default'
    });
  }

  protected async complete(messages: readonly Message[], context: MarketContext, signal?: AbortSignal): Promise<string> {
    const response = await this.completions.create(
      {
        model: this.identity.config.model,
        max_tokens: this.identity.config.maxTokens ?? DEFAULT_MAX_TOKENS,
        temperature: this.identity.config.temperature,
        messages: [
          { role: 'system', content: buildSystemPrompt(context) },
          ...messages.map((message): OpenAI.ChatCompletionMessageParam => (
            message.role === 'advisor'
              ? { role: 'assistant', content: message.content }
              : { role: 'user', content: message.content }
          ))
        ]
      },
      { signal, timeout: this.identity.config.timeoutMs }
    );

    const parsed = ChatCompletionResponseSchema.safeParse(response);
    if (!parsed.success) {
      throw this.failure('MalformedResponse', `Unexpected response shape from ${this.providerLabel}`, {
        issues: parsed.error.issues.map((issue) => issue.message)
      });
    }

    const content = parsed.data.choices[0].message.content;
    if (!content) {
      throw this.failure('MalformedResponse', `${this.providerLabel} reply contained no text content`);
    }

    return content;
  }

  protected classifyError(error: unknown): AdvisorError | undefined {
    if (error instanceof OpenAI.APIConnectionTimeoutError) {
      return this.failure('Timeout', `${this.providerLabel} request timed out: ${error.message}`);
    }

    if (error instanceof OpenAI.APIConnectionError) {
      return this.failure('Unreachable', `${this.providerLabel} is unreachable: ${error.message}`);
    }

    return super.classifyError(error);
  }
}
