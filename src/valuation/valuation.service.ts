import { Injectable } from '@nestjs/common';
import Decimal from 'decimal.js';
import { ZERO, safeDivide, sumDecimals, toPlainString } from '../common/utils/decimal.util';
import { FifoLedger } from '../ledger/fifo-ledger';
import { LedgerBook } from '../ledger/ledger-book';
import { ReportRow } from './report-row.entity';

// Turns ledger state plus current prices into reporting records.
// Read-only: never mutates the book.
@Injectable()
export class ValuationService {
  /**
   * One row per (base, quote), sorted by base then quote.
   * Prices are looked up by each ledger's raw pair identifier; a missing
   * price reports current price and unrealized P&L as zero.
   */
  compute(book: LedgerBook, pricesByPairIdentifier: ReadonlyMap<string, Decimal>): ReportRow[] {
    return book.entries().map((ledger) => this.toRow(ledger, pricesByPairIdentifier));
  }

  /**
   * Unrealized P&L over open lots at the given price.
   * Zero when there is no price or nothing left to value.
   */
  unrealizedPnl(ledger: FifoLedger, currentPrice: Decimal): Decimal {
    const remaining = ledger.remainingInventory();
    if (currentPrice.lessThanOrEqualTo(0) || remaining.volume.lessThanOrEqualTo(0)) {
      return ZERO;
    }
    return sumDecimals(
      ledger.getLots().map((lot) => currentPrice.minus(lot.unitCost).times(lot.remainingVolume)),
    );
  }

  private toRow(ledger: FifoLedger, prices: ReadonlyMap<string, Decimal>): ReportRow {
    const totals = ledger.getTotals();
    const remaining = ledger.remainingInventory();
    const identifier = ledger.examplePairIdentifier;
    const currentPrice = (identifier !== undefined ? prices.get(identifier) : undefined) ?? ZERO;

    return Object.freeze({
      asset: ledger.base,
      quote: ledger.quote,
      totalBought: toPlainString(totals.buyVolume),
      avgBuyPrice: toPlainString(safeDivide(totals.buyCost, totals.buyVolume)),
      totalSold: toPlainString(totals.sellVolume),
      avgSellPrice: toPlainString(safeDivide(totals.sellProceeds, totals.sellVolume)),
      netFromHistory: toPlainString(totals.buyVolume.minus(totals.sellVolume)),
      remainingUnsoldVolume: toPlainString(remaining.volume),
      avgBuyPriceOfRemaining: toPlainString(safeDivide(remaining.cost, remaining.volume)),
      feesTotal: toPlainString(totals.feesTotal),
      realizedPnl: toPlainString(totals.realizedPnl),
      currentPrice: toPlainString(currentPrice),
      unrealizedPnl: toPlainString(this.unrealizedPnl(ledger, currentPrice)),
    });
  }
}
