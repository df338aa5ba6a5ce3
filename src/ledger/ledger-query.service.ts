import { Injectable, NotFoundException } from '@nestjs/common';
import Decimal from 'decimal.js';
import { toPlainString } from '../common/utils/decimal.util';
import { MarketPriceService } from '../market-price/market-price.service';
import { ReportRow } from '../valuation/report-row.entity';
import { ValuationService } from '../valuation/valuation.service';
import { LedgerStorageService } from './ledger-storage.service';
import { AdjustmentRecord } from './entities/adjustment-record.entity';
import {
  AdjustmentCandidateDto,
  LedgerLotsResponseDto,
  PairIdentifiersResponseDto,
} from './dto/ledger-response.dto';

// Read-only operations for ledger data.
// CQRS pattern - queries separated from mutations.
@Injectable()
export class LedgerQueryService {
  constructor(
    private readonly storage: LedgerStorageService,
    private readonly marketPriceService: MarketPriceService,
    private readonly valuationService: ValuationService,
  ) {}

  /**
   * Reporting records for every pair, sorted by base then quote.
   * Unrealized P&L uses the latest known price per pair identifier.
   */
  getReport(): ReportRow[] {
    return this.valuationService.compute(this.storage.getBook(), this.marketPriceService.getPriceMap());
  }

  /** Number of (base, quote) pairs tracked */
  getLedgerCount(): number {
    return this.storage.getBook().size;
  }

  getTradeIdCount(): number {
    return this.storage.getTradeIdCount();
  }

  /** Pairs that still hold inventory, i.e. what an adjustment can shrink */
  getAdjustmentCandidates(): AdjustmentCandidateDto[] {
    return this.storage
      .getBook()
      .entries()
      .filter((ledger) => ledger.hasRemainingInventory())
      .map((ledger) => ({
        base: ledger.base,
        quote: ledger.quote,
        remainingVolume: toPlainString(ledger.remainingInventory().volume),
      }));
  }

  /**
   * Open lots of one pair, oldest first.
   * @throws NotFoundException when the pair has no ledger
   */
  getLots(base: string, quote: string): LedgerLotsResponseDto {
    const ledger = this.storage.getBook().get(base.trim().toUpperCase(), quote.trim().toUpperCase());
    if (!ledger) {
      throw new NotFoundException(`No trades recorded for ${base}/${quote}`);
    }

    const remaining = ledger.remainingInventory();
    return {
      base: ledger.base,
      quote: ledger.quote,
      pairIdentifier: ledger.examplePairIdentifier ?? null,
      lastSeenTimestamp: ledger.lastSeenTimestamp,
      remainingVolume: toPlainString(remaining.volume),
      remainingCost: toPlainString(remaining.cost),
      lots: ledger.getLots().map((lot) => ({
        remainingVolume: toPlainString(lot.remainingVolume),
        unitCost: toPlainString(lot.unitCost),
        totalCost: toPlainString(lot.totalCost),
      })),
    };
  }

  /** Raw identifiers seen in trade history, and which of them have no price yet */
  getPairIdentifiers(): PairIdentifiersResponseDto {
    const pairIdentifiers = this.storage.getBook().pairIdentifiers();
    return {
      pairIdentifiers,
      missingPrices: pairIdentifiers.filter((identifier) => !this.marketPriceService.hasPrice(identifier)),
    };
  }

  /** Adjustment history, oldest first */
  getAdjustments(): AdjustmentRecord[] {
    return this.storage.getAdjustments();
  }

  /** Returns current market prices with last update timestamp */
  getMarketPrices(pairIdentifier?: string): { prices: Record<string, string>; lastUpdate: Date } {
    const lastUpdate = this.marketPriceService.getLastUpdateTime();
    const source = this.pricesFor(
      pairIdentifier ? [pairIdentifier] : this.marketPriceService.getAvailablePairs(),
    );

    const prices: Record<string, string> = {};
    source.forEach(([identifier, price]) => {
      prices[identifier] = toPlainString(price);
    });
    return { prices, lastUpdate };
  }

  private pricesFor(identifiers: string[]): Array<[string, Decimal]> {
    const found: Array<[string, Decimal]> = [];
    identifiers.forEach((identifier) => {
      const price = this.marketPriceService.getPrice(identifier);
      if (price !== undefined) {
        found.push([identifier, price]);
      }
    });
    return found;
  }
}
