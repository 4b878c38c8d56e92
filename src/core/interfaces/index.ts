// ============================================================================
// CORE INTERFACES - LAYERED ARCHITECTURE
// ============================================================================

import { ConversationView } from './advisor-client.interface';
import {
  AdvisorErrorKind,
  AdvisorIdentity,
  AdvisorOutcome,
  AdvisorStatus,
  MarketContext,
  Message,
  OrchestrationResult
} from '../../types';

export * from './advisor-client.interface';

// ===== APPLICATION SERVICES INTERFACES =====
export interface RoundOptions {
  /** Free-text question appended to the market prompt. */
  question?: string;
  /** Restricts `askAll` to these advisor names. */
  advisors?: string[];
  signal?: AbortSignal;
  /** Extra attempts for transient failures. Defaults to 0. */
  retries?: number;
  retryDelayMs?: number;
}

export interface IAdvisoryOrchestrator {
  registerAdvisor(identity: AdvisorIdentity): AdvisorStatus;
  askAll(context: MarketContext, options?: RoundOptions): Promise<OrchestrationResult>;
  askOne(advisor: string, context: MarketContext, options?: RoundOptions): Promise<AdvisorOutcome>;
  listAdvisors(): AdvisorStatus[];
  endSession(): void;
}

// ===== DOMAIN SERVICES INTERFACES =====
export interface IConversationStore {
  get(advisor: string): ConversationView;
  append(advisor: string, message: Message): void;
  reset(advisor: string): void;
  resetAll(): void;
}

// ===== INFRASTRUCTURE INTERFACES =====
export type CredentialResolver = (credentialRef: string) => string | undefined;

export interface ILogger {
  debug(message: string, meta?: object): void;
  info(message: string, meta?: object): void;
  warn(message: string, meta?: object): void;
  error(message: string, error?: Error, meta?: object): void;
}

// ===== ERROR TYPES =====
export class DomainError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DomainError';
  }
}

export class ValidationDomainError extends DomainError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationDomainError';
  }
}

export class InfrastructureError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly source: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'InfrastructureError';
  }
}

export class AdvisorError extends InfrastructureError {
  constructor(
    public readonly kind: AdvisorErrorKind,
    message: string,
    advisor: string,
    details?: Record<string, unknown>
  ) {
    super(message, kind, advisor, details);
    this.name = 'AdvisorError';
  }

  get advisor(): string {
    return this.source;
  }
}

export class ApplicationError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ApplicationError';
  }
}

export class NoAdvisorsRegisteredError extends ApplicationError {
  constructor(details?: Record<string, unknown>) {
    super('No advisors are registered', 'NO_ADVISORS_REGISTERED', details);
    this.name = 'NoAdvisorsRegisteredError';
  }
}

export class ConfigurationError extends ApplicationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_CONFIGURATION', details);
    this.name = 'ConfigurationError';
  }
}
