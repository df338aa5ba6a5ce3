// Result of one ingest call
export interface IngestResponseDto {
  received: number;
  applied: number;
  duplicates: number;            // records whose txid was already ingested
  filtered: number;              // dropped by the quote allow-list
  skipped: SkippedRecordDto[];   // malformed records, by position in the batch
  oversold: OversoldSellDto[];   // sells larger than the open lots
  ledgers: number;               // pairs tracked after this call
}

export interface SkippedRecordDto {
  index: number;
  reason: string;
}

export interface OversoldSellDto {
  index: number;
  base: string;
  quote: string;
  unmatchedVolume: string;
}
