// ============================================================================
// CLAUDE ADVISOR ADAPTER - INFRASTRUCTURE LAYER
// ============================================================================

import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import { AdvisorClientOptions, AdvisorError } from '../../core/interfaces';
import { buildSystemPrompt } from '../../domain/services/PromptBuilder';
import { AdvisorIdentity, MarketContext, Message } from '../../types';
import { BaseAdvisorAdapter } from './BaseAdvisorAdapter';

export interface ClaudeMessagesApi {
  create(
    body: Anthropic.MessageCreateParamsNonStreaming,
    options?: { signal?: AbortSignal; timeout?: number }
  ): PromiseLike<unknown>;
}

const ClaudeResponseSchema = z.object({
  content: z.array(z.object({
    type: z.string(),
    text: z.string().optional()
  }))
});

const DEFAULT_MAX_TOKENS = 2048;

export class ClaudeAdvisorAdapter extends BaseAdvisorAdapter {
  private readonly messages: ClaudeMessagesApi;

  constructor(
    identity: AdvisorIdentity,
    credential: string,
    options: AdvisorClientOptions = {},
    messages?: ClaudeMessagesApi
  ) {
    super(identity, credential, options);

    this.messages = messages ?? new Anthropic({
      apiKey: credential,
      baseURL: identity.config.endpoint,
      timeout: identity.config.timeoutMs,
      maxRetries: 0
    }).messages;

    this.logger.info('ClaudeAdvisorAdapter initialized', { model: identity.config.model });
  }

  protected async complete(messages: readonly Message[], context: MarketContext, signal?: AbortSignal): Promise<string> {
    const response = await this.messages.create(
      {
        model: this.identity.config.model,
        max_tokens: this.identity.config.maxTokens ?? DEFAULT_MAX_TOKENS,
        temperature: this.identity.config.temperature,
        system: buildSystemPrompt(context),
        messages: messages.map((message): Anthropic.MessageParam => ({
          role: message.role === 'advisor' ? 'assistant' : 'user',
          content: message.content
        }))
      },
      { signal, timeout: this.identity.config.timeoutMs }
    );

    const parsed = ClaudeResponseSchema.safeParse(response);
    if (!parsed.success) {
      throw this.failure('MalformedResponse', 'Unexpected response shape from Claude', {
        issues: parsed.error.issues.map((issue) => issue.message)
      });
    }

    const text = parsed.data.content
      .filter((block) => block.type === 'text' && block.text !== undefined)
      .map((block) => block.text)
      .join('');

    if (!text) {
      throw this.failure('MalformedResponse', 'Claude reply contained no text content');
    }

    return text;
  }

  protected classifyError(error: unknown): AdvisorError | undefined {
    if (error instanceof Anthropic.APIConnectionTimeoutError) {
      return this.failure('Timeout', `Claude request timed out: ${error.message}`);
    }

    if (error instanceof Anthropic.APIConnectionError) {
      return this.failure('Unreachable', `Claude is unreachable: ${error.message}`);
    }

    return super.classifyError(error);
  }
}
