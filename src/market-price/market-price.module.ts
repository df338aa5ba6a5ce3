import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ledgerConfig } from '../config/ledger.config';
import { MarketPriceService } from './market-price.service';

@Module({
  imports: [ConfigModule.forFeature(ledgerConfig)],
  providers: [MarketPriceService],
  exports: [MarketPriceService],
})
export class MarketPriceModule {}
