import { Logger } from '@nestjs/common';
import Decimal from 'decimal.js';
import { ZERO } from '../common/utils/decimal.util';
import { isSuspectPair, pairKey, parsePair } from '../pairs/pair-normalizer';
import { FifoLedger } from './fifo-ledger';
import { parseTradeRecord } from './trade-record.parser';
import { TradeRecord, TradeSide } from './entities/trade-record.entity';

export interface LedgerBookOptions {
  includeFeesInCost: boolean;
  quoteFilter?: ReadonlySet<string>;  // unset: every quote
}

export interface SkippedRecord {
  index: number;
  reason: string;
}

export interface OversoldSell {
  index: number;
  base: string;
  quote: string;
  unmatchedVolume: Decimal;
}

export type ApplyOutcome =
  | { status: 'applied'; ledger: FifoLedger; unmatchedVolume: Decimal }
  | { status: 'filtered'; quote: string };

export interface ApplySummary {
  received: number;
  applied: number;
  filtered: number;
  skipped: SkippedRecord[];
  oversold: OversoldSell[];
}

// One FIFO ledger per (base, quote). Records are folded in the order given;
// FIFO results depend on buys preceding the sells they cover.
export class LedgerBook {
  private readonly logger = new Logger(LedgerBook.name);
  private readonly ledgers: Map<string, FifoLedger> = new Map();

  constructor(private readonly options: LedgerBookOptions) {}

  get size(): number {
    return this.ledgers.size;
  }

  /**
   * Applies a batch of raw records. Malformed records are skipped and
   * listed; they never abort the batch.
   */
  applyAll(records: readonly unknown[]): ApplySummary {
    const summary: ApplySummary = {
      received: records.length,
      applied: 0,
      filtered: 0,
      skipped: [],
      oversold: [],
    };

    records.forEach((raw, index) => {
      const parsed = parseTradeRecord(raw);
      if (!parsed.ok) {
        this.logger.debug(`Skipping record #${index}: ${parsed.reason}`);
        summary.skipped.push({ index, reason: parsed.reason });
        return;
      }

      const outcome = this.apply(parsed.record);
      if (outcome.status === 'filtered') {
        summary.filtered++;
        return;
      }

      summary.applied++;
      if (outcome.unmatchedVolume.greaterThan(0)) {
        const { base, quote } = outcome.ledger;
        this.logger.warn(
          `Sell #${index} on ${base}/${quote} exceeds open lots by ${outcome.unmatchedVolume.toString()}; trade history may be incomplete`,
        );
        summary.oversold.push({ index, base, quote, unmatchedVolume: outcome.unmatchedVolume });
      }
    });

    return summary;
  }

  /** Routes one parsed record to its ledger, creating the ledger on first use. */
  apply(record: TradeRecord): ApplyOutcome {
    const pair = parsePair(record.pairIdentifier);
    const quoteFilter = this.options.quoteFilter;
    if (quoteFilter && !quoteFilter.has(pair.quote)) {
      return { status: 'filtered', quote: pair.quote };
    }

    const ledger = this.getOrCreate(pair.base, pair.quote);
    ledger.observe(record.timestamp, record.pairIdentifier);

    const fill = { volume: record.volume, price: record.price, cost: record.cost, fee: record.fee };
    if (record.side === TradeSide.BUY) {
      ledger.applyBuy(fill, this.options.includeFeesInCost);
      return { status: 'applied', ledger, unmatchedVolume: ZERO };
    }

    const match = ledger.applySell(fill, this.options.includeFeesInCost);
    return { status: 'applied', ledger, unmatchedVolume: match.unmatchedVolume };
  }

  get(base: string, quote: string): FifoLedger | undefined {
    return this.ledgers.get(pairKey(base, quote));
  }

  /** Ledgers ordered by base, then quote. */
  entries(): FifoLedger[] {
    return Array.from(this.ledgers.values()).sort(compareLedgers);
  }

  /** Raw identifiers to look prices up by, one per ledger. */
  pairIdentifiers(): string[] {
    const identifiers = new Set<string>();
    for (const ledger of this.ledgers.values()) {
      if (ledger.examplePairIdentifier) {
        identifiers.add(ledger.examplePairIdentifier);
      }
    }
    return Array.from(identifiers).sort();
  }

  private getOrCreate(base: string, quote: string): FifoLedger {
    const key = pairKey(base, quote);
    let ledger = this.ledgers.get(key);
    if (!ledger) {
      if (isSuspectPair({ base, quote })) {
        this.logger.warn(`Pair key "${key}" has an empty side; check the source identifiers`);
      }
      ledger = new FifoLedger(base, quote);
      this.ledgers.set(key, ledger);
    }
    return ledger;
  }
}

function compareLedgers(a: FifoLedger, b: FifoLedger): number {
  if (a.base !== b.base) {
    return a.base < b.base ? -1 : 1;
  }
  if (a.quote !== b.quote) {
    return a.quote < b.quote ? -1 : 1;
  }
  return 0;
}
