import { AdvisorIdentity, MarketContext, Message } from '../../types';
import type { ILogger } from './index';

export interface ConversationView {
  readonly advisor: string;
  readonly messages: readonly Message[];
}

/**
 * Capability shared by every provider adapter.
 *
 * `send` performs exactly one provider call and resolves with the reply text,
 * or rejects with an `AdvisorError`. The history already ends with the user
 * turn for this round; adapters never mutate it.
 */
export interface AdvisorClient {
  readonly identity: AdvisorIdentity;

  send(history: ConversationView, context: MarketContext, signal?: AbortSignal): Promise<string>;
}

export interface AdvisorClientOptions {
  /** Overrides the global fetch for adapters that call a REST endpoint directly. */
  fetch?: typeof fetch;
  logger?: ILogger;
}

export type AdvisorClientFactory = (
  identity: AdvisorIdentity,
  credential: string,
  options?: AdvisorClientOptions
) => AdvisorClient;
