import { IsNotEmpty, IsNumberString, IsObject, IsString } from 'class-validator';

// Update price for a single pair identifier
export class UpdatePriceDto {
  @IsString()
  @IsNotEmpty()
  pair!: string;

  @IsNumberString()
  price!: string;
}

// Update prices for multiple pair identifiers at once
export class BulkUpdatePricesDto {
  @IsObject()
  prices!: Record<string, string>;  // { "XXBTZUSD": "61000.5", "XETHZUSD": "2400" }
}

// Ticker snapshot as returned by the exchange, keyed by pair identifier
export class TickerSnapshotDto {
  @IsObject()
  ticker!: Record<string, unknown>;  // { "XXBTZUSD": { "a": ["61001"], "b": ["61000"], "c": ["61000.5"] } }
}
