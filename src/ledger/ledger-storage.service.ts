import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { ledgerConfig } from '../config/ledger.config';
import { LedgerBook } from './ledger-book';
import { AdjustmentRecord } from './entities/adjustment-record.entity';

// In-memory session state: one ledger book built from configuration,
// ingested trade ids for idempotency, and the adjustment history.
// Nothing survives a restart.
@Injectable()
export class LedgerStorageService {
  private book: LedgerBook;
  private tradeIdIndex: Set<string> = new Set();
  private adjustments: AdjustmentRecord[] = [];

  constructor(
    @Inject(ledgerConfig.KEY)
    private readonly config: ConfigType<typeof ledgerConfig>,
  ) {
    this.book = this.createBook();
  }

  getBook(): LedgerBook {
    return this.book;
  }

  hasTradeId(tradeId: string): boolean {
    return this.tradeIdIndex.has(tradeId);
  }

  markTradeId(tradeId: string): void {
    this.tradeIdIndex.add(tradeId);
  }

  /** Number of distinct trade ids ingested - useful for testing/metrics */
  getTradeIdCount(): number {
    return this.tradeIdIndex.size;
  }

  saveAdjustment(record: AdjustmentRecord): void {
    this.adjustments.push(record);
  }

  /** Returns defensive copy to prevent external mutation */
  getAdjustments(): AdjustmentRecord[] {
    return [...this.adjustments];
  }

  /** Starts a fresh book; drops ids and adjustments */
  clearAllData(): void {
    this.book = this.createBook();
    this.tradeIdIndex.clear();
    this.adjustments = [];
  }

  private createBook(): LedgerBook {
    return new LedgerBook({
      includeFeesInCost: this.config.includeFeesInCost,
      quoteFilter: this.config.quoteFilter,
    });
  }
}
