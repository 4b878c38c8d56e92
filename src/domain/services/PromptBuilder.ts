// ============================================================================
// PROMPT BUILDER - DOMAIN LAYER
// ============================================================================

import { MarketContext } from '../../types';

const DEFAULT_REQUEST = 'Please provide a full strategy analysis based on the current data.';

export function buildSystemPrompt(context: MarketContext): string {
  return `You are an expert crypto trading mentor reviewing live market data for ${context.symbol}.
Analyze the indicators you are given and decide whether a trade is appropriate.

If a trade is appropriate, include exactly one JSON object in your reply, in this format:
{
  "strategy_name": "Name of strategy",
  "action": "BUY" | "SELL" | "WAIT",
  "confidence_score": 1-10,
  "rationale": "Plain English explanation",
  "trade_params": {
    "symbol": "${context.symbol}",
    "entry_price": number,
    "stop_loss": number,
    "take_profit": number,
    "position_size": number,
    "trailing_stop_percent": number,
    "scaling_targets": [number]
  }
}

A short explanation before the JSON block is welcome. If the user is only asking a question,
or conditions are too dangerous to trade, answer in plain text without JSON.
Always set a stop loss when proposing a trade.`;
}

/**
 * Text of the user turn for one round: the market snapshot, then either the
 * caller's question or a request for a full analysis.
 */
export function buildUserTurn(context: MarketContext, question?: string): string {
  const snapshot = `CURRENT MARKET DATA:\n${JSON.stringify(context, null, 2)}`;
  const trimmed = question?.trim();

  return trimmed
    ? `${snapshot}\n\nUSER'S QUESTION: ${trimmed}`
    : `${snapshot}\n\n${DEFAULT_REQUEST}`;
}
