// ============================================================================
// PROPOSAL EXTRACTOR - DOMAIN LAYER
// ============================================================================

import { z } from 'zod';
import { ProposalWarning, TradeAction, TradeProposal } from '../../types';

export interface ExtractionResult {
  proposal: TradeProposal | null;
  warning?: ProposalWarning;
}

const finite = z.number().finite();
const price = finite.positive('Prices must be positive.');

// Runtime schema for a normalized proposal block
export const TradeProposalSchema = z.object({
  action: z.string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(['buy', 'sell', 'hold', 'wait']))
    .transform((action): TradeAction => (action === 'wait' ? 'hold' : action)),
  symbol: z.string().trim().min(1, 'Symbol cannot be empty.'),
  entry: price.optional(),
  stopLoss: price.optional(),
  takeProfit: price.optional(),
  positionSize: finite.positive('Position size must be positive.').optional(),
  // advisors answer on 1-10, 0-100 or in words; kept as given
  confidence: z.union([finite, z.string().trim().min(1)]).optional(),
  rationale: z.string().optional(),
  strategyName: z.string().optional(),
  trailingStopPercent: finite.positive().optional(),
  scalingTargets: z.array(price).optional(),
}).superRefine((proposal, ctx) => {
  if (proposal.action === 'hold') return;

  if (proposal.entry === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `An entry price is required for ${proposal.action} proposals.`,
      path: ['entry'],
    });
    return;
  }

  const { entry, stopLoss, takeProfit } = proposal;
  const long = proposal.action === 'buy';

  if (stopLoss !== undefined && (long ? stopLoss >= entry : stopLoss <= entry)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Stop loss must be ${long ? 'below' : 'above'} entry for ${proposal.action} proposals.`,
      path: ['stopLoss'],
    });
  }

  if (takeProfit !== undefined && (long ? takeProfit <= entry : takeProfit >= entry)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Take profit must be ${long ? 'above' : 'below'} entry for ${proposal.action} proposals.`,
      path: ['takeProfit'],
    });
  }
});

// Accepted spellings per field, snake_case first
const FIELD_ALIASES: Record<keyof z.input<typeof TradeProposalSchema>, string[]> = {
  action: ['action', 'signal'],
  symbol: ['symbol', 'pair', 'ticker'],
  entry: ['entry', 'entry_price', 'entryPrice'],
  stopLoss: ['stop_loss', 'stopLoss'],
  takeProfit: ['take_profit', 'takeProfit'],
  positionSize: ['position_size', 'positionSize', 'size'],
  confidence: ['confidence', 'confidence_score', 'confidenceScore'],
  rationale: ['rationale', 'reasoning'],
  strategyName: ['strategy_name', 'strategyName'],
  trailingStopPercent: ['trailing_stop_percent', 'trailingStopPercent'],
  scalingTargets: ['scaling_targets', 'scalingTargets'],
};

const NESTED_KEYS = ['trade_params', 'tradeParams'];

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Every top-level balanced `{...}` region of `text`, in order. Braces inside
 * double-quoted strings are ignored. An unclosed `{` is skipped, so complete
 * blocks after it are still found. Runs in a single pass.
 */
export function findJsonBlocks(text: string): string[] {
  const open: number[] = [];
  const closed = new Set<number>();
  const spans: Array<{ start: number; end: number; parent: number | undefined }> = [];
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
    } else if (ch === '"') {
      // quotes in prose outside any brace do not open a string
      inString = open.length > 0;
    } else if (ch === '{') {
      open.push(i);
    } else if (ch === '}') {
      const start = open.pop();
      if (start !== undefined) {
        closed.add(start);
        spans.push({ start, end: i, parent: open[open.length - 1] });
      }
    }
  }

  // a span is top-level unless an enclosing brace was closed too
  return spans
    .filter((span) => span.parent === undefined || !closed.has(span.parent))
    .sort((a, b) => a.start - b.start)
    .map((span) => text.slice(span.start, span.end + 1));
}

function parseBlock(block: string): JsonObject | undefined {
  for (const candidate of [block, block.replace(/,\s*([}\]])/g, '$1')]) {
    try {
      const parsed: unknown = JSON.parse(candidate);
      return isObject(parsed) ? parsed : undefined;
    } catch {
      continue;
    }
  }
  return undefined;
}

function hasAction(block: JsonObject): boolean {
  return 'action' in block || NESTED_KEYS.some((key) => {
    const nested = block[key];
    return isObject(nested) && 'action' in nested;
  });
}

function normalize(block: JsonObject): JsonObject {
  const nested = NESTED_KEYS.map((key) => block[key]).find(isObject);
  const sources = nested ? [nested, block] : [block];
  const normalized: JsonObject = {};

  for (const [field, aliases] of Object.entries(FIELD_ALIASES)) {
    for (const source of sources) {
      const key = aliases.find((alias) => source[alias] !== undefined && source[alias] !== null);
      if (key !== undefined) {
        normalized[field] = source[key];
        break;
      }
    }
  }

  return normalized;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || 'proposal'}: ${issue.message}`);
}

function freezeProposal(data: z.output<typeof TradeProposalSchema>): TradeProposal {
  const proposal: { -readonly [K in keyof TradeProposal]: TradeProposal[K] } = {
    action: data.action,
    symbol: data.symbol
  };

  if (data.entry !== undefined) proposal.entry = data.entry;
  if (data.stopLoss !== undefined) proposal.stopLoss = data.stopLoss;
  if (data.takeProfit !== undefined) proposal.takeProfit = data.takeProfit;
  if (data.positionSize !== undefined) proposal.positionSize = data.positionSize;
  if (data.confidence !== undefined) proposal.confidence = data.confidence;
  if (data.rationale !== undefined) proposal.rationale = data.rationale;
  if (data.strategyName !== undefined) proposal.strategyName = data.strategyName;
  if (data.trailingStopPercent !== undefined) proposal.trailingStopPercent = data.trailingStopPercent;
  if (data.scalingTargets !== undefined) proposal.scalingTargets = Object.freeze([...data.scalingTargets]);

  return Object.freeze(proposal);
}

/**
 * Pulls a validated trade proposal out of free-form advisor text.
 *
 * Most replies carry no structured block at all, which is not a warning.
 * A block that cannot be parsed, or parses but fails validation, yields no
 * proposal plus a warning the caller may surface.
 */
export class ProposalExtractor {
  extract(text: string): TradeProposal | null {
    return this.inspect(text).proposal;
  }

  inspect(text: string): ExtractionResult {
    const blocks = findJsonBlocks(text);
    if (blocks.length === 0) {
      return { proposal: null };
    }

    const parsed = blocks
      .map(parseBlock)
      .filter((block): block is JsonObject => block !== undefined);

    if (parsed.length === 0) {
      return {
        proposal: null,
        warning: {
          code: 'ProposalUnparseable',
          message: `Found ${blocks.length} structured block(s) but none could be parsed`,
          issues: []
        }
      };
    }

    const block = parsed.find(hasAction) ?? parsed[0];
    const validation = TradeProposalSchema.safeParse(normalize(block));

    if (!validation.success) {
      return {
        proposal: null,
        warning: {
          code: 'ProposalInvalid',
          message: 'Structured block failed proposal validation',
          issues: formatIssues(validation.error)
        }
      };
    }

    return { proposal: freezeProposal(validation.data) };
  }
}
