import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import Decimal from 'decimal.js';
import { v4 as uuidv4 } from 'uuid';
import { tryParseDecimal } from '../common/utils/decimal.util';
import { MarketPriceService, TickerApplyResult } from '../market-price/market-price.service';
import { LedgerStorageService } from './ledger-storage.service';
import { parseTradeRecord } from './trade-record.parser';
import { ApplySummary } from './ledger-book';
import { FifoLedger } from './fifo-ledger';
import { AdjustmentRecord } from './entities/adjustment-record.entity';

export interface IngestResult extends ApplySummary {
  duplicates: number;
}

export interface AdjustmentRequest {
  base: string;
  quote: string;
  targetVolume: string;
}

interface ValidatedAdjustment {
  ledger: FifoLedger;
  target: Decimal;
}

// Trade ingestion, inventory adjustments and price updates.
// All ledger arithmetic happens in FifoLedger with exact decimals.
@Injectable()
export class LedgerService {
  private readonly logger = new Logger(LedgerService.name);

  constructor(
    private readonly storage: LedgerStorageService,
    private readonly marketPriceService: MarketPriceService,
  ) {}

  /**
   * Applies a batch of raw trade records in order.
   * Idempotent per txid - records already ingested (in an earlier call or
   * earlier in this batch) are counted as duplicates and not applied.
   * A malformed record does not claim its txid, so a corrected resend applies.
   * Indices in the summary refer to positions in `records`.
   */
  ingestTrades(records: readonly unknown[]): IngestResult {
    const fresh: unknown[] = [];
    const positions: number[] = [];
    const batchIds = new Set<string>();
    let duplicates = 0;

    records.forEach((raw, index) => {
      const parsed = parseTradeRecord(raw);
      const tradeId = parsed.ok ? parsed.record.tradeId : undefined;
      if (tradeId !== undefined) {
        if (this.storage.hasTradeId(tradeId) || batchIds.has(tradeId)) {
          duplicates++;
          return;
        }
        batchIds.add(tradeId);
      }
      fresh.push(raw);
      positions.push(index);
    });

    const summary = this.storage.getBook().applyAll(fresh);
    batchIds.forEach((tradeId) => this.storage.markTradeId(tradeId));

    this.logger.log(
      `Ingested ${records.length} records: ${summary.applied} applied, ${duplicates} duplicate, ` +
        `${summary.filtered} filtered, ${summary.skipped.length} skipped`,
    );

    return {
      received: records.length,
      applied: summary.applied,
      filtered: summary.filtered,
      duplicates,
      skipped: summary.skipped.map((item) => ({ ...item, index: positions[item.index] })),
      oversold: summary.oversold.map((item) => ({ ...item, index: positions[item.index] })),
    };
  }

  /**
   * Shrinks the open inventory of one pair to a target volume.
   * Realized P&L, sell totals and fees are left as they are.
   * @throws BadRequestException for a negative or non-numeric target
   * @throws NotFoundException when the pair has no ledger
   */
  adjustBalance(request: AdjustmentRequest): AdjustmentRecord {
    return this.applyAdjustment(this.validateAdjustment(request));
  }

  /** Validates every request before shrinking any ledger. */
  adjustBalances(requests: readonly AdjustmentRequest[]): AdjustmentRecord[] {
    const validated = requests.map((request) => this.validateAdjustment(request));
    return validated.map((adjustment) => this.applyAdjustment(adjustment));
  }

  /** Updates single pair's market price for unrealized P&L calc */
  updatePrice(pairIdentifier: string, price: string): void {
    this.marketPriceService.updatePrice(pairIdentifier, price);
  }

  /** Batch updates market prices across multiple pairs */
  updatePrices(prices: Record<string, string>): void {
    this.marketPriceService.updatePrices(prices);
  }

  applyTicker(ticker: Record<string, unknown>): TickerApplyResult {
    return this.marketPriceService.applyTicker(ticker);
  }

  /** Clears all session state */
  clearAll(): void {
    this.storage.clearAllData();
    this.marketPriceService.clearAllPrices();
  }

  private validateAdjustment(request: AdjustmentRequest): ValidatedAdjustment {
    const base = request.base.trim().toUpperCase();
    const quote = request.quote.trim().toUpperCase();

    const target = tryParseDecimal(request.targetVolume);
    if (!target) {
      throw new BadRequestException(`Target volume for ${base}/${quote} is not a number: ${request.targetVolume}`);
    }
    if (target.isNegative() && !target.isZero()) {
      throw new BadRequestException(`Target volume for ${base}/${quote} cannot be negative`);
    }

    const ledger = this.storage.getBook().get(base, quote);
    if (!ledger) {
      throw new NotFoundException(`No trades recorded for ${base}/${quote}`);
    }
    return { ledger, target };
  }

  private applyAdjustment({ ledger, target }: ValidatedAdjustment): AdjustmentRecord {
    const result = ledger.shrinkToTarget(target);
    const record: AdjustmentRecord = {
      id: uuidv4(),
      base: ledger.base,
      quote: ledger.quote,
      targetVolume: target,
      previousVolume: result.previousVolume,
      remainingVolume: result.remainingVolume,
      removedVolume: result.removedVolume,
      appliedAt: new Date(),
    };
    this.storage.saveAdjustment(record);

    this.logger.log(
      `Adjusted ${ledger.base}/${ledger.quote}: ${result.previousVolume.toString()} -> ${result.remainingVolume.toString()}`,
    );
    return record;
  }
}
