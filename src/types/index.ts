import { z } from 'zod';

// Core advisory types

export const PROVIDER_KINDS = ['claude', 'openai', 'grok', 'gemini'] as const;
export type ProviderKind = typeof PROVIDER_KINDS[number];

// Largest delay a Node timer honours; longer values fire immediately
export const MAX_TIMEOUT_MS = 2_147_483_647;

// Zod schema for AdvisorIdentity, used for registration and config files
export const AdvisorIdentitySchema = z.object({
  name: z.string().trim().min(1, 'Advisor name cannot be empty.'),
  provider: z.enum(PROVIDER_KINDS),
  config: z.object({
    model: z.string().min(1, 'Model id cannot be empty.'),
    endpoint: z.string().url('Endpoint must be a valid URL.').optional(),
    credentialRef: z.string().min(1, 'Credential reference cannot be empty.'),
    timeoutMs: z.number()
      .int()
      .positive('Timeout must be a positive number of milliseconds.')
      .max(MAX_TIMEOUT_MS, `Timeout cannot exceed ${MAX_TIMEOUT_MS} milliseconds.`),
    maxTokens: z.number().int().positive().optional(),
    temperature: z.number().min(0).max(2).optional(),
  }),
});

export type AdvisorIdentity = z.infer<typeof AdvisorIdentitySchema>;

const IndicatorValueSchema = z.union([z.number(), z.string(), z.boolean(), z.null()]);

export const MarketContextSchema = z.object({
  symbol: z.string().min(1, 'Symbol cannot be empty.'),
  price: z.number(),
  indicators: z.record(IndicatorValueSchema).default({}),
  timestamp: z.string().min(1, 'Timestamp cannot be empty.'),
  extra: z.record(z.unknown()).optional(),
});

export type MarketContext = z.infer<typeof MarketContextSchema>;

export type MessageRole = 'user' | 'advisor';

export interface Message {
  readonly id: string;
  readonly role: MessageRole;
  readonly content: string;
  readonly timestamp: Date;
}

// Advisor outcome types

export type AdvisorErrorKind =
  | 'Unauthenticated'
  | 'RateLimited'
  | 'Unreachable'
  | 'MalformedResponse'
  | 'Timeout'
  | 'Cancelled'
  | 'AdvisorBusy'
  | 'UnknownAdvisor';

export const TRANSIENT_ERROR_KINDS: readonly AdvisorErrorKind[] = ['RateLimited', 'Unreachable', 'Timeout'];

export interface AdvisorErrorDetail {
  kind: AdvisorErrorKind;
  message: string;
}

interface OutcomeBase {
  advisor: string;
  provider: ProviderKind | null;
  latencyMs: number;
  attempts: number;
}

export interface AdvisorSuccess extends OutcomeBase {
  status: 'ok';
  reply: string;
  proposal?: TradeProposal;
  proposalWarning?: ProposalWarning;
}

export interface AdvisorFailure extends OutcomeBase {
  status: 'error';
  error: AdvisorErrorDetail;
}

export interface AdvisorTimeout extends OutcomeBase {
  status: 'timeout';
  error: AdvisorErrorDetail;
}

export type AdvisorOutcome = Readonly<AdvisorSuccess> | Readonly<AdvisorFailure> | Readonly<AdvisorTimeout>;

// Trade proposal types

export type TradeAction = 'buy' | 'sell' | 'hold';

export interface TradeProposal {
  readonly action: TradeAction;
  readonly symbol: string;
  readonly entry?: number;
  readonly stopLoss?: number;
  readonly takeProfit?: number;
  readonly positionSize?: number;
  readonly confidence?: number | string;
  readonly rationale?: string;
  readonly strategyName?: string;
  readonly trailingStopPercent?: number;
  readonly scalingTargets?: readonly number[];
}

export interface ProposalWarning {
  code: 'ProposalUnparseable' | 'ProposalInvalid';
  message: string;
  issues: string[];
}

export interface OrchestrationResult {
  readonly roundId: string;
  readonly context: Readonly<MarketContext>;
  readonly outcomes: readonly AdvisorOutcome[];
  readonly proposals: Readonly<Record<string, TradeProposal>>;
  readonly warnings: Readonly<Record<string, ProposalWarning>>;
  readonly startedAt: Date;
  readonly completedAt: Date;
}

export interface AdvisorStatus {
  name: string;
  provider: ProviderKind;
  model: string;
  state: 'ready' | 'unusable';
  reason?: string;
}

// Configuration types
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface RejectedAdvisorEntry {
  index: number;
  name?: string;
  issues: string[];
}

export interface AppConfig {
  advisors: AdvisorIdentity[];
  rejectedAdvisors: RejectedAdvisorEntry[];
  defaultTimeoutMs: number;
  nodeEnv: string;
  logLevel: LogLevel;
}

// CLI types
export interface AskOptions {
  advisor?: string;
  question?: string;
  retries?: string;
  json?: boolean;
}
