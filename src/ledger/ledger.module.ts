import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ledgerConfig } from '../config/ledger.config';
import { MarketPriceModule } from '../market-price/market-price.module';
import { ValuationModule } from '../valuation/valuation.module';
import { LedgerController } from './ledger.controller';
import { LedgerService } from './ledger.service';
import { LedgerQueryService } from './ledger-query.service';
import { LedgerStorageService } from './ledger-storage.service';

@Module({
  imports: [
    ConfigModule.forFeature(ledgerConfig),
    MarketPriceModule, // prices for unrealized P&L
    ValuationModule,
  ],
  controllers: [LedgerController],
  providers: [
    LedgerStorageService,
    LedgerService,      // Mutations: ingestTrades, adjustBalance, price updates, clearAll
    LedgerQueryService, // Queries: getReport, getLots, getAdjustmentCandidates, getMarketPrices
  ],
  exports: [LedgerQueryService],
})
export class LedgerModule {}
