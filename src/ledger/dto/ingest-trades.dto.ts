import { ArrayMaxSize, IsArray } from 'class-validator';

// Batch of trade records in the order they happened.
// Records are not validated here: the ledger book skips malformed ones
// and reports them instead of rejecting the batch.
export class IngestTradesDto {
  @IsArray()
  @ArrayMaxSize(100000)
  trades!: unknown[];
}
