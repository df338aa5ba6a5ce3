import Decimal from 'decimal.js';
import { ZERO, tryParseDecimal } from '../common/utils/decimal.util';
import { RawTradeRecord, TradeParseResult, TradeSide } from './entities/trade-record.entity';

type NumericField = 'vol' | 'price' | 'cost' | 'fee';

// Missing values ("", 0, null, undefined) read as absent, like the export leaves them.
function isBlank(value: unknown): boolean {
  return value === undefined || value === null || value === '' || value === 0;
}

function readAmount(raw: RawTradeRecord, field: NumericField): Decimal | string | undefined {
  const value = raw[field];
  if (isBlank(value)) {
    return undefined;
  }
  const parsed = tryParseDecimal(value);
  if (!parsed) {
    return `${field} is not a decimal: ${String(value)}`;
  }
  if (parsed.isNegative() && !parsed.isZero()) {
    return `${field} must not be negative: ${String(value)}`;
  }
  return parsed;
}

function readTimestamp(value: unknown): number | undefined {
  if (isBlank(value)) {
    return 0;
  }
  const parsed = tryParseDecimal(value);
  return parsed ? parsed.toNumber() : undefined;
}

function readPairIdentifier(value: unknown): string | undefined {
  if (value === undefined || value === null) {
    return '';
  }
  return typeof value === 'string' ? value.trim() : undefined;
}

function readSide(value: unknown): TradeSide | undefined {
  const side = typeof value === 'string' ? value.trim().toLowerCase() : '';
  if (side === TradeSide.BUY) return TradeSide.BUY;
  if (side === TradeSide.SELL) return TradeSide.SELL;
  return undefined;
}

function isRecord(value: unknown): value is RawTradeRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Typed parse step for one trade record.
 * Never throws: malformed input comes back as { ok: false, reason }.
 */
export function parseTradeRecord(raw: unknown): TradeParseResult {
  if (!isRecord(raw)) {
    return { ok: false, reason: 'record is not an object' };
  }

  const pairIdentifier = readPairIdentifier(raw.pair);
  if (pairIdentifier === undefined) {
    return { ok: false, reason: 'pair is not a string' };
  }

  const side = readSide(raw.type);
  if (!side) {
    return { ok: false, reason: `unknown side: ${String(raw.type)}` };
  }

  const volume = readAmount(raw, 'vol') ?? ZERO;
  const price = readAmount(raw, 'price') ?? ZERO;
  const fee = readAmount(raw, 'fee') ?? ZERO;
  if (typeof volume === 'string') return { ok: false, reason: volume };
  if (typeof price === 'string') return { ok: false, reason: price };
  if (typeof fee === 'string') return { ok: false, reason: fee };

  const cost = readAmount(raw, 'cost') ?? volume.times(price);
  if (typeof cost === 'string') return { ok: false, reason: cost };

  const timestamp = readTimestamp(raw.time);
  if (timestamp === undefined) {
    return { ok: false, reason: `time is not numeric: ${String(raw.time)}` };
  }

  return {
    ok: true,
    record: {
      tradeId: typeof raw.txid === 'string' && raw.txid !== '' ? raw.txid : undefined,
      pairIdentifier,
      side,
      volume,
      price,
      cost,
      fee,
      timestamp,
    },
  };
}
