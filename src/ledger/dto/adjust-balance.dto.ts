import { Type } from 'class-transformer';
import { ArrayNotEmpty, IsArray, IsNotEmpty, IsNumberString, IsString, ValidateNested } from 'class-validator';

// Shrinks open inventory of one pair to targetVolume (usually "0" when the
// units were sold or moved elsewhere). Decimal as text to keep precision.
export class AdjustBalanceDto {
  @IsString()
  @IsNotEmpty()
  base!: string;

  @IsString()
  @IsNotEmpty()
  quote!: string;

  @IsNumberString()
  targetVolume!: string;
}

export class BulkAdjustBalancesDto {
  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => AdjustBalanceDto)
  adjustments!: AdjustBalanceDto[];
}
