import Decimal from 'decimal.js';

export enum TradeSide {
  BUY = 'buy',
  SELL = 'sell',
}

// Trade as delivered by the exchange history export.
// Numeric fields arrive as text or numbers; anything may be missing.
export interface RawTradeRecord {
  txid?: unknown;    // exchange trade id, used for idempotent ingestion
  pair?: unknown;    // exchange pair identifier, e.g. XXBTZUSD
  type?: unknown;    // 'buy' | 'sell', any case
  vol?: unknown;
  price?: unknown;
  cost?: unknown;    // vol * price when absent
  fee?: unknown;
  time?: unknown;    // unix seconds
}

// Trade after the typed parse step, with exact decimal values.
export interface TradeRecord {
  tradeId?: string;
  pairIdentifier: string;
  side: TradeSide;
  volume: Decimal;
  price: Decimal;
  cost: Decimal;
  fee: Decimal;
  timestamp: number;
}

export type TradeParseResult =
  | { ok: true; record: TradeRecord }
  | { ok: false; reason: string };
