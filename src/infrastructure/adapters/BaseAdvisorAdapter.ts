// ============================================================================
// BASE ADVISOR ADAPTER - INFRASTRUCTURE LAYER
// ============================================================================

import {
  AdvisorClient,
  AdvisorClientOptions,
  AdvisorError,
  ApplicationError,
  ConversationView,
  ILogger,
  InfrastructureError
} from '../../core/interfaces';
import { AdvisorErrorKind, AdvisorIdentity, MarketContext, Message } from '../../types';
import { ConsoleLogger } from '../logging/ConsoleLogger';

export function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

export function kindForStatus(status: number): AdvisorErrorKind {
  if (status === 401 || status === 403) return 'Unauthenticated';
  if (status === 429) return 'RateLimited';
  if (status === 408) return 'Timeout';
  return 'Unreachable';
}

/**
 * Shared plumbing for provider adapters: argument checks, logging and the
 * mapping of transport failures onto AdvisorError kinds. Subclasses shape the
 * request and unwrap the reply for one provider.
 */
export abstract class BaseAdvisorAdapter implements AdvisorClient {
  protected readonly logger: ILogger;

  constructor(
    readonly identity: AdvisorIdentity,
    protected readonly credential: string,
    protected readonly options: AdvisorClientOptions = {}
  ) {
    this.validateConfig();
    this.logger = options.logger ?? new ConsoleLogger(`Advisor:${identity.name}`);
  }

  protected abstract complete(
    messages: readonly Message[],
    context: MarketContext,
    signal?: AbortSignal
  ): Promise<string>;

  async send(history: ConversationView, context: MarketContext, signal?: AbortSignal): Promise<string> {
    if (!context) {
      throw new ApplicationError('Market context is required', 'INVALID_CONTEXT', { advisor: this.identity.name });
    }

    if (history.advisor !== this.identity.name) {
      throw new ApplicationError(
        `History of ${history.advisor} cannot be sent to ${this.identity.name}`,
        'HISTORY_MISMATCH',
        { advisor: this.identity.name, historyOwner: history.advisor }
      );
    }

    const startTime = Date.now();
    this.logger.debug('Sending conversation to advisor', {
      advisor: this.identity.name,
      model: this.identity.config.model,
      turns: history.messages.length
    });

    try {
      const reply = await this.complete(history.messages, context, signal);

      if (!reply.trim()) {
        throw this.failure('MalformedResponse', 'Provider returned an empty reply');
      }

      this.logger.debug('Advisor replied', { advisor: this.identity.name, latencyMs: Date.now() - startTime, length: reply.length });
      return reply;
    } catch (error) {
      throw this.toAdvisorError(error, signal);
    }
  }

  /**
   * Provider-specific error mapping. The default understands any error that
   * carries an HTTP `status`.
   */
  protected classifyError(error: unknown): AdvisorError | undefined {
    const status = statusOf(error);
    if (status === undefined) return undefined;

    return this.failure(kindForStatus(status), `${this.providerLabel} responded with HTTP ${status}: ${this.messageOf(error)}`, { status });
  }

  protected failure(kind: AdvisorErrorKind, message: string, details?: Record<string, unknown>): AdvisorError {
    return new AdvisorError(kind, message, this.identity.name, details);
  }

  protected get providerLabel(): string {
    return this.identity.provider.charAt(0).toUpperCase() + this.identity.provider.slice(1);
  }

  protected messageOf(error: unknown): string {
    return error instanceof Error ? error.message : 'Unknown error';
  }

  private toAdvisorError(error: unknown, signal?: AbortSignal): Error {
    if (error instanceof AdvisorError || error instanceof ApplicationError) {
      return error;
    }

    if (signal?.aborted) {
      return this.failure('Unreachable', `${this.providerLabel} request aborted`, { aborted: true });
    }

    const classified = this.classifyError(error);
    if (classified) {
      this.logger.warn('Advisor request failed', {
        advisor: this.identity.name,
        kind: classified.kind,
        message: classified.message
      });
      return classified;
    }

    this.logger.error('Unexpected advisor failure', error instanceof Error ? error : undefined, {
      advisor: this.identity.name
    });
    return this.failure('Unreachable', `${this.providerLabel} request failed: ${this.messageOf(error)}`);
  }

  protected validateConfig(): void {
    if (!this.credential) {
      throw new InfrastructureError(
        `Credential for ${this.identity.name} is required`,
        'MISSING_API_KEY',
        this.identity.name
      );
    }
  }
}
