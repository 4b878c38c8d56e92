// ============================================================================
// ADVISORY ORCHESTRATOR - APPLICATION LAYER
// ============================================================================

import { v4 as uuidv4 } from 'uuid';
import {
  AdvisorClient,
  AdvisorClientFactory,
  AdvisorClientOptions,
  AdvisorError,
  ApplicationError,
  ConversationView,
  CredentialResolver,
  IAdvisoryOrchestrator,
  ILogger,
  NoAdvisorsRegisteredError,
  RoundOptions,
  ValidationDomainError
} from '../../core/interfaces';
import { envCredentialResolver } from '../../config';
import { createAdvisorClient } from '../../core/factories/advisor-client.factory';
import { ConversationStore, createMessage } from '../../domain/services/ConversationStore';
import { buildUserTurn } from '../../domain/services/PromptBuilder';
import { ProposalExtractor } from '../../domain/services/ProposalExtractor';
import { ConsoleLogger } from '../../infrastructure/logging/ConsoleLogger';
import {
  AdvisorErrorKind,
  AdvisorIdentity,
  AdvisorIdentitySchema,
  AdvisorOutcome,
  AdvisorStatus,
  MarketContext,
  OrchestrationResult,
  ProposalWarning,
  ProviderKind,
  TradeProposal,
  TRANSIENT_ERROR_KINDS
} from '../../types';
import { AbortedError, TimeoutError, linkSignals, raceAbort, sleep, withTimeout } from '../../utils/async';
import { deepFreeze, frozenCopy } from '../../utils/immutable';

interface AdvisorRegistration {
  identity: AdvisorIdentity;
  client?: AdvisorClient;
  unusableReason?: string;
}

interface FailureDetail {
  kind: AdvisorErrorKind;
  message: string;
}

export interface AdvisoryOrchestratorOptions {
  store?: ConversationStore;
  extractor?: ProposalExtractor;
  clientFactory?: AdvisorClientFactory;
  clientOptions?: AdvisorClientOptions;
  credentials?: CredentialResolver;
  logger?: ILogger;
}

const DEFAULT_RETRY_DELAY_MS = 1000;

/**
 * Fans one market context out to every registered advisor, each on its own
 * task with its own timeout, and folds the results into one round.
 *
 * Histories change only after a call fully succeeds: the user turn and the
 * advisor reply are appended together. Failed, timed-out and cancelled calls
 * leave history untouched, and a late reply after a timeout is dropped.
 */
export class AdvisoryOrchestrator implements IAdvisoryOrchestrator {
  private readonly registrations = new Map<string, AdvisorRegistration>();
  private readonly inFlight = new Set<string>();
  private readonly store: ConversationStore;
  private readonly extractor: ProposalExtractor;
  private readonly clientFactory: AdvisorClientFactory;
  private readonly credentials: CredentialResolver;
  private readonly logger: ILogger;
  private session = new AbortController();

  constructor(private readonly options: AdvisoryOrchestratorOptions = {}) {
    this.store = options.store ?? new ConversationStore();
    this.extractor = options.extractor ?? new ProposalExtractor();
    this.clientFactory = options.clientFactory ?? createAdvisorClient;
    this.credentials = options.credentials ?? envCredentialResolver;
    this.logger = options.logger ?? new ConsoleLogger('Orchestrator');
  }

  // ===== REGISTRATION =====

  registerAdvisor(identity: AdvisorIdentity): AdvisorStatus {
    const parsed = AdvisorIdentitySchema.safeParse(identity);
    if (!parsed.success) {
      throw new ValidationDomainError('Invalid advisor identity', {
        name: identity?.name,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      });
    }

    const frozen = deepFreeze(parsed.data);
    const { name } = frozen;
    const replacing = this.registrations.has(name);
    const registration: AdvisorRegistration = { identity: frozen };
    const credential = this.credentials(frozen.config.credentialRef);

    if (!credential) {
      registration.unusableReason = `Credential ${frozen.config.credentialRef} is not configured`;
    } else {
      try {
        registration.client = this.clientFactory(frozen, credential, {
          ...this.options.clientOptions,
          logger: this.logger
        });
      } catch (error) {
        registration.unusableReason = error instanceof Error ? error.message : 'Advisor client could not be created';
      }
    }

    this.registrations.set(name, registration);

    if (registration.unusableReason) {
      this.logger.warn('Advisor registered as unusable', {
        advisor: name,
        provider: frozen.provider,
        kind: 'Unauthenticated',
        reason: registration.unusableReason
      });
    } else {
      this.logger.info(replacing ? 'Advisor re-registered, history preserved' : 'Advisor registered', {
        advisor: name,
        provider: frozen.provider,
        model: frozen.config.model
      });
    }

    return this.statusOf(registration);
  }

  /**
   * Registers each identity independently; a rejected entry is logged and
   * skipped.
   */
  registerAll(identities: AdvisorIdentity[]): AdvisorStatus[] {
    const statuses: AdvisorStatus[] = [];

    for (const identity of identities) {
      try {
        statuses.push(this.registerAdvisor(identity));
      } catch (error) {
        this.logger.error('Advisor registration rejected', error instanceof Error ? error : undefined, {
          advisor: identity?.name
        });
      }
    }

    return statuses;
  }

  listAdvisors(): AdvisorStatus[] {
    return Array.from(this.registrations.values(), (registration) => this.statusOf(registration));
  }

  // ===== ROUNDS =====

  async askAll(context: MarketContext, options: RoundOptions = {}): Promise<OrchestrationResult> {
    this.assertContext(context);

    if (this.registrations.size === 0) {
      throw new NoAdvisorsRegisteredError({ requested: options.advisors });
    }

    const targets = this.selectTargets(options.advisors);

    const roundId = uuidv4();
    const startedAt = new Date();
    const snapshot = frozenCopy(context);

    this.logger.info('Dispatching round', {
      roundId,
      symbol: snapshot.symbol,
      advisors: targets.map((registration) => registration.identity.name)
    });

    // each task resolves to its own outcome slot and never rejects
    const outcomes = await Promise.all(
      targets.map((registration) => this.dispatch(registration, snapshot, options))
    );

    const proposals: Record<string, TradeProposal> = {};
    const warnings: Record<string, ProposalWarning> = {};

    for (const outcome of outcomes) {
      if (outcome.status !== 'ok') continue;
      if (outcome.proposal) proposals[outcome.advisor] = outcome.proposal;
      if (outcome.proposalWarning) warnings[outcome.advisor] = outcome.proposalWarning;
    }

    const result: OrchestrationResult = Object.freeze({
      roundId,
      context: snapshot,
      outcomes: Object.freeze(outcomes),
      proposals: Object.freeze(proposals),
      warnings: Object.freeze(warnings),
      startedAt,
      completedAt: new Date()
    });

    this.logger.info('Round completed', {
      roundId,
      ok: outcomes.filter((outcome) => outcome.status === 'ok').length,
      failed: outcomes.filter((outcome) => outcome.status !== 'ok').length,
      proposals: Object.keys(proposals).length
    });

    return result;
  }

  async askOne(advisor: string, context: MarketContext, options: RoundOptions = {}): Promise<AdvisorOutcome> {
    this.assertContext(context);

    const registration = this.registrations.get(advisor);
    if (!registration) {
      return this.failureOutcome(advisor, null, { kind: 'UnknownAdvisor', message: `Advisor ${advisor} is not registered` }, 0, 0);
    }

    return this.dispatch(registration, frozenCopy(context), options);
  }

  // ===== HISTORY & SESSION =====

  history(advisor: string): ConversationView {
    return this.store.view(advisor);
  }

  resetHistory(advisor: string): void {
    this.store.reset(advisor);
    this.logger.debug('Conversation history reset', { advisor });
  }

  resetAllHistories(): void {
    this.store.resetAll();
    this.logger.debug('All conversation histories reset');
  }

  /**
   * Cancels every outstanding call and clears all histories. Registrations
   * survive, so a new session can start right away.
   */
  endSession(): void {
    const outstanding = Array.from(this.inFlight);
    this.session.abort();
    this.session = new AbortController();
    this.store.resetAll();

    this.logger.info('Session ended', { cancelled: outstanding });
  }

  // ===== DISPATCH =====

  private async dispatch(
    registration: AdvisorRegistration,
    context: Readonly<MarketContext>,
    options: RoundOptions
  ): Promise<AdvisorOutcome> {
    const { identity, client } = registration;
    const { name, provider } = identity;

    // already warned about at registration
    if (!client) {
      return this.failureOutcome(name, provider, {
        kind: 'Unauthenticated',
        message: registration.unusableReason ?? `Advisor ${name} is not usable`
      }, 0, 0, false);
    }

    if (this.inFlight.has(name)) {
      return this.failureOutcome(name, provider, {
        kind: 'AdvisorBusy',
        message: `A round for ${name} is still outstanding`
      }, 0, 0);
    }

    this.inFlight.add(name);
    const controller = new AbortController();
    const unlink = linkSignals(controller, [options.signal, this.session.signal]);
    const maxAttempts = 1 + Math.max(0, Math.floor(options.retries ?? 0));
    const retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    const startTime = Date.now();
    let attempts = 0;

    try {
      const userTurn = createMessage('user', buildUserTurn(context, options.question));
      const history: ConversationView = Object.freeze({
        advisor: name,
        messages: Object.freeze([...this.store.get(name).messages, userTurn])
      });

      for (;;) {
        attempts++;

        try {
          const reply = await this.attempt(client, history, context, identity.config.timeoutMs, controller.signal);

          if (controller.signal.aborted) {
            throw new AbortedError();
          }

          this.store.append(name, userTurn);
          this.store.append(name, createMessage('advisor', reply));

          const extraction = this.extractor.inspect(reply);
          if (extraction.warning) {
            this.logger.warn('Advisor reply carried an unusable proposal', {
              advisor: name,
              code: extraction.warning.code,
              issues: extraction.warning.issues
            });
          }

          const latencyMs = Date.now() - startTime;
          this.logger.info('Advisor responded', { advisor: name, latencyMs, attempts, proposal: extraction.proposal !== null });

          return Object.freeze({
            advisor: name,
            provider,
            status: 'ok' as const,
            reply,
            latencyMs,
            attempts,
            ...(extraction.proposal ? { proposal: extraction.proposal } : {}),
            ...(extraction.warning ? { proposalWarning: extraction.warning } : {})
          });
        } catch (error) {
          const failure = controller.signal.aborted
            ? { kind: 'Cancelled' as const, message: `Round for ${name} was cancelled` }
            : this.describeFailure(error, identity.config.timeoutMs);

          if (attempts < maxAttempts && TRANSIENT_ERROR_KINDS.includes(failure.kind)) {
            this.logger.warn('Retrying advisor after transient failure', { advisor: name, attempt: attempts, kind: failure.kind });
            try {
              await sleep(retryDelayMs * attempts, controller.signal);
              continue;
            } catch {
              return this.failureOutcome(name, provider, {
                kind: 'Cancelled',
                message: `Round for ${name} was cancelled`
              }, Date.now() - startTime, attempts);
            }
          }

          return this.failureOutcome(name, provider, failure, Date.now() - startTime, attempts);
        }
      }
    } finally {
      unlink();
      this.inFlight.delete(name);
    }
  }

  private async attempt(
    client: AdvisorClient,
    history: ConversationView,
    context: Readonly<MarketContext>,
    timeoutMs: number,
    signal: AbortSignal
  ): Promise<string> {
    if (signal.aborted) {
      throw new AbortedError();
    }

    const controller = new AbortController();
    const unlink = linkSignals(controller, [signal]);

    try {
      const call = withTimeout(client.send(history, context, controller.signal), timeoutMs, () => controller.abort());
      return await raceAbort(call, signal);
    } finally {
      unlink();
    }
  }

  private describeFailure(error: unknown, timeoutMs: number): FailureDetail {
    if (error instanceof TimeoutError) {
      return { kind: 'Timeout', message: `No reply within ${timeoutMs}ms` };
    }

    if (error instanceof AdvisorError) {
      return { kind: error.kind, message: error.message };
    }

    if (error instanceof ApplicationError) {
      return { kind: 'MalformedResponse', message: error.message };
    }

    return {
      kind: 'Unreachable',
      message: error instanceof Error ? error.message : 'Unknown error'
    };
  }

  private failureOutcome(
    advisor: string,
    provider: ProviderKind | null,
    error: FailureDetail,
    latencyMs: number,
    attempts: number,
    log = true
  ): AdvisorOutcome {
    if (log && error.kind !== 'Cancelled') {
      this.logger.warn('Advisor call failed', { advisor, kind: error.kind, message: error.message, latencyMs });
    }

    const base = { advisor, provider, latencyMs, attempts, error: Object.freeze({ ...error }) };

    return Object.freeze(
      error.kind === 'Timeout'
        ? { ...base, status: 'timeout' as const }
        : { ...base, status: 'error' as const }
    );
  }

  // ===== HELPERS =====

  // Registration order; unusable advisors stay in so they report Unauthenticated
  private selectTargets(requested?: string[]): AdvisorRegistration[] {
    const registered = Array.from(this.registrations.values());
    if (!requested) {
      return registered;
    }

    const unknown = requested.filter((name) => !this.registrations.has(name));
    if (unknown.length > 0) {
      this.logger.warn('Ignoring unregistered advisors', { advisors: unknown });
    }

    return registered.filter((registration) => requested.includes(registration.identity.name));
  }

  private assertContext(context: MarketContext): void {
    if (context === null || context === undefined) {
      throw new ApplicationError('A market context is required for every round', 'INVALID_CONTEXT');
    }
  }

  private statusOf(registration: AdvisorRegistration): AdvisorStatus {
    const { identity } = registration;
    return {
      name: identity.name,
      provider: identity.provider,
      model: identity.config.model,
      state: registration.client ? 'ready' : 'unusable',
      ...(registration.unusableReason ? { reason: registration.unusableReason } : {})
    };
  }
}
