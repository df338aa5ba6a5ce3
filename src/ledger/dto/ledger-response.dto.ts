// Open lot of one pair, oldest first
export interface LotDto {
  remainingVolume: string;
  unitCost: string;
  totalCost: string;
}

export interface LedgerLotsResponseDto {
  base: string;
  quote: string;
  pairIdentifier: string | null;
  lastSeenTimestamp: number;      // unix seconds
  remainingVolume: string;
  remainingCost: string;
  lots: LotDto[];
}

// Pair that still holds inventory and can be shrunk
export interface AdjustmentCandidateDto {
  base: string;
  quote: string;
  remainingVolume: string;
}

export interface AdjustmentResponseDto {
  id: string;
  base: string;
  quote: string;
  targetVolume: string;
  previousVolume: string;
  remainingVolume: string;
  removedVolume: string;
  appliedAt: string;
}

// Identifiers to request prices for
export interface PairIdentifiersResponseDto {
  pairIdentifiers: string[];
  missingPrices: string[];
}

export interface MarketPricesResponseDto {
  prices: Record<string, string>;   // { "XXBTZUSD": "61000.5" }
  lastUpdated: string;              // ISO timestamp
  source: string;                   // how prices arrived
}
