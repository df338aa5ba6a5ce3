import Decimal from 'decimal.js';
import { ZERO, safeDivide, sumDecimals } from '../common/utils/decimal.util';
import { LedgerFill, LedgerTotals, LotSnapshot, SellMatch, ShrinkResult } from './entities/lot.entity';

interface OpenLot {
  remainingVolume: Decimal;
  unitCost: Decimal;
}

// FIFO lot accounting for one (base, quote) pair.
// Buys append lots at the tail; sells and shrinks consume from the head.
// Lots never leave this class: callers see snapshots only.
export class FifoLedger {
  private readonly lots: OpenLot[] = [];  // oldest first

  private buyVolume = ZERO;
  private buyCost = ZERO;
  private sellVolume = ZERO;
  private sellProceeds = ZERO;
  private feesTotal = ZERO;
  private realizedPnl = ZERO;
  private unmatchedSellVolume = ZERO;
  private externallyShrunkVolume = ZERO;

  private lastSeen = 0;
  private examplePair: string | undefined;

  constructor(
    readonly base: string,
    readonly quote: string,
  ) {}

  get lastSeenTimestamp(): number {
    return this.lastSeen;
  }

  get examplePairIdentifier(): string | undefined {
    return this.examplePair;
  }

  /** Records the trade's timestamp and keeps the first non-empty raw identifier. */
  observe(timestamp: number, pairIdentifier: string): void {
    this.lastSeen = Math.max(this.lastSeen, timestamp);
    if (!this.examplePair && pairIdentifier) {
      this.examplePair = pairIdentifier;
    }
  }

  /**
   * Adds a lot at the tail of the queue.
   * Fee is added to the lot's cost basis when includeFeeInCost is set.
   * A zero-volume buy yields a zero-volume lot with zero unit cost.
   */
  applyBuy(fill: LedgerFill, includeFeeInCost: boolean): void {
    const cost = fill.cost ?? fill.volume.times(fill.price);
    const buyCost = includeFeeInCost ? cost.plus(fill.fee) : cost;

    this.buyVolume = this.buyVolume.plus(fill.volume);
    this.buyCost = this.buyCost.plus(buyCost);
    this.feesTotal = this.feesTotal.plus(fill.fee);

    this.lots.push({
      remainingVolume: fill.volume,
      unitCost: safeDivide(buyCost, fill.volume),
    });
  }

  /**
   * Matches a sell against the oldest lots first and books realized P&L.
   * Proceeds are net of the fee when includeFeeInCost is set.
   * Selling more than the open lots hold consumes them all; the excess is
   * reported as unmatchedVolume and realizes nothing.
   */
  applySell(fill: LedgerFill, includeFeeInCost: boolean): SellMatch {
    const cost = fill.cost ?? fill.volume.times(fill.price);
    const proceeds = includeFeeInCost ? cost.minus(fill.fee) : cost;

    this.sellVolume = this.sellVolume.plus(fill.volume);
    this.sellProceeds = this.sellProceeds.plus(proceeds);
    this.feesTotal = this.feesTotal.plus(fill.fee);

    const perUnitProceeds = safeDivide(proceeds, fill.volume);
    let realized = ZERO;

    const unmatched = this.consume(fill.volume, (use, lot) => {
      realized = realized.plus(use.times(perUnitProceeds)).minus(use.times(lot.unitCost));
    });

    this.realizedPnl = this.realizedPnl.plus(realized);
    this.unmatchedSellVolume = this.unmatchedSellVolume.plus(unmatched);

    return {
      matchedVolume: fill.volume.minus(unmatched),
      unmatchedVolume: unmatched,
      realizedPnl: realized,
    };
  }

  /**
   * Reduces open inventory to targetVolume, oldest lots first.
   * Models disposals outside the recorded history, so sell totals, fees and
   * realized P&L stay untouched. Never adds inventory.
   */
  shrinkToTarget(targetVolume: Decimal): ShrinkResult {
    if (targetVolume.isNegative() && !targetVolume.isZero()) {
      throw new RangeError(`Target volume must not be negative, got ${targetVolume.toString()}`);
    }

    const previousVolume = this.remainingInventory().volume;
    if (targetVolume.greaterThanOrEqualTo(previousVolume)) {
      return { previousVolume, remainingVolume: previousVolume, removedVolume: ZERO };
    }

    const toRemove = previousVolume.minus(targetVolume);
    this.consume(toRemove, () => undefined);
    this.externallyShrunkVolume = this.externallyShrunkVolume.plus(toRemove);

    return {
      previousVolume,
      remainingVolume: this.remainingInventory().volume,
      removedVolume: toRemove,
    };
  }

  /** Sum of open lot volumes and their cost basis. */
  remainingInventory(): { volume: Decimal; cost: Decimal } {
    const snapshots = this.getLots();
    return {
      volume: sumDecimals(snapshots.map((lot) => lot.remainingVolume)),
      cost: sumDecimals(snapshots.map((lot) => lot.totalCost)),
    };
  }

  hasRemainingInventory(): boolean {
    return this.remainingInventory().volume.greaterThan(0);
  }

  getLots(): LotSnapshot[] {
    return this.lots.map((lot) =>
      Object.freeze({
        remainingVolume: lot.remainingVolume,
        unitCost: lot.unitCost,
        totalCost: lot.remainingVolume.times(lot.unitCost),
      }),
    );
  }

  getTotals(): LedgerTotals {
    return {
      buyVolume: this.buyVolume,
      buyCost: this.buyCost,
      sellVolume: this.sellVolume,
      sellProceeds: this.sellProceeds,
      feesTotal: this.feesTotal,
      realizedPnl: this.realizedPnl,
      unmatchedSellVolume: this.unmatchedSellVolume,
      externallyShrunkVolume: this.externallyShrunkVolume,
    };
  }

  // Takes `volume` units from the head of the queue, splitting the oldest lot
  // when the volume ends inside it. Returns the volume no lot could cover.
  private consume(volume: Decimal, onUse: (use: Decimal, lot: OpenLot) => void): Decimal {
    let remaining = volume;

    while (remaining.greaterThan(0) && this.lots.length > 0) {
      const oldestLot = this.lots[0];
      const use = Decimal.min(oldestLot.remainingVolume, remaining);

      onUse(use, oldestLot);

      oldestLot.remainingVolume = oldestLot.remainingVolume.minus(use);
      remaining = remaining.minus(use);

      if (oldestLot.remainingVolume.lessThanOrEqualTo(0)) {
        this.lots.shift();
      }
    }

    return remaining;
  }
}
