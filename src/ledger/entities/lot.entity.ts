import Decimal from 'decimal.js';

// Read-only view of one open FIFO lot.
// totalCost is always remainingVolume × unitCost.
export interface LotSnapshot {
  readonly remainingVolume: Decimal;
  readonly unitCost: Decimal;       // cost basis per unit, fees included when capitalized
  readonly totalCost: Decimal;
}

// Buy or sell fill handed to a ledger.
export interface LedgerFill {
  volume: Decimal;
  price: Decimal;
  cost?: Decimal;                    // defaults to volume × price
  fee: Decimal;
}

// Outcome of matching one sell against open lots.
export interface SellMatch {
  matchedVolume: Decimal;
  unmatchedVolume: Decimal;          // > 0 when the sell exceeded open inventory
  realizedPnl: Decimal;
}

export interface ShrinkResult {
  previousVolume: Decimal;
  remainingVolume: Decimal;
  removedVolume: Decimal;
}

// Running totals of one ledger.
export interface LedgerTotals {
  buyVolume: Decimal;
  buyCost: Decimal;
  sellVolume: Decimal;
  sellProceeds: Decimal;
  feesTotal: Decimal;
  realizedPnl: Decimal;
  unmatchedSellVolume: Decimal;
  externallyShrunkVolume: Decimal;
}
