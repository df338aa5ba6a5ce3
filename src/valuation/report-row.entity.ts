// Per-pair reporting record. Every numeric field is an exact decimal as text.
// Averages read "0" when there is no volume to average over.
export interface ReportRow {
  readonly asset: string;
  readonly quote: string;
  readonly totalBought: string;
  readonly avgBuyPrice: string;
  readonly totalSold: string;
  readonly avgSellPrice: string;
  readonly netFromHistory: string;          // units bought minus units sold
  readonly remainingUnsoldVolume: string;
  readonly avgBuyPriceOfRemaining: string;
  readonly feesTotal: string;
  readonly realizedPnl: string;             // quote currency
  readonly currentPrice: string;            // "0" when no price is known
  readonly unrealizedPnl: string;           // quote currency
}
