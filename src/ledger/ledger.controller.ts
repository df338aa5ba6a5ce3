import { Body, Controller, Get, HttpCode, HttpStatus, Param, Post, Query } from '@nestjs/common';
import { toPlainString } from '../common/utils/decimal.util';
import { ReportRow } from '../valuation/report-row.entity';
import { LedgerService } from './ledger.service';
import { LedgerQueryService } from './ledger-query.service';
import { AdjustmentRecord } from './entities/adjustment-record.entity';
import { IngestTradesDto } from './dto/ingest-trades.dto';
import { IngestResponseDto } from './dto/ingest-response.dto';
import { AdjustBalanceDto, BulkAdjustBalancesDto } from './dto/adjust-balance.dto';
import { BulkUpdatePricesDto, TickerSnapshotDto, UpdatePriceDto } from './dto/update-price.dto';
import {
  AdjustmentCandidateDto,
  AdjustmentResponseDto,
  LedgerLotsResponseDto,
  MarketPricesResponseDto,
  PairIdentifiersResponseDto,
} from './dto/ledger-response.dto';

@Controller('ledger')
export class LedgerController {
  constructor(
    private readonly ledgerService: LedgerService,
    private readonly queryService: LedgerQueryService,
  ) {}

  /**
   * Applies a batch of trade records in the order given.
   * Malformed records are skipped and listed, never rejected as a batch.
   *
   * POST /ledger/trades
   */
  @Post('trades')
  @HttpCode(HttpStatus.OK)
  ingestTrades(@Body() ingestTradesDto: IngestTradesDto): IngestResponseDto {
    const result = this.ledgerService.ingestTrades(ingestTradesDto.trades);
    return {
      received: result.received,
      applied: result.applied,
      duplicates: result.duplicates,
      filtered: result.filtered,
      skipped: result.skipped,
      oversold: result.oversold.map((item) => ({
        index: item.index,
        base: item.base,
        quote: item.quote,
        unmatchedVolume: toPlainString(item.unmatchedVolume),
      })),
      ledgers: this.queryService.getLedgerCount(),
    };
  }

  /**
   * Per-pair averages, fees, realized and unrealized P&L.
   *
   * GET /ledger/report
   */
  @Get('report')
  @HttpCode(HttpStatus.OK)
  getReport(): ReportRow[] {
    return this.queryService.getReport();
  }

  /**
   * Open FIFO lots of one pair, oldest first.
   *
   * GET /ledger/lots/XBT/USD
   */
  @Get('lots/:base/:quote')
  @HttpCode(HttpStatus.OK)
  getLots(@Param('base') base: string, @Param('quote') quote: string): LedgerLotsResponseDto {
    return this.queryService.getLots(base, quote);
  }

  /** GET /ledger/adjustments/candidates */
  @Get('adjustments/candidates')
  @HttpCode(HttpStatus.OK)
  getAdjustmentCandidates(): AdjustmentCandidateDto[] {
    return this.queryService.getAdjustmentCandidates();
  }

  /** GET /ledger/adjustments */
  @Get('adjustments')
  @HttpCode(HttpStatus.OK)
  getAdjustments(): AdjustmentResponseDto[] {
    return this.queryService.getAdjustments().map((record) => this.toAdjustmentResponse(record));
  }

  /**
   * Shrinks a pair's open inventory to a target volume, oldest lots first.
   * Realized P&L is not affected.
   *
   * POST /ledger/adjustments
   */
  @Post('adjustments')
  @HttpCode(HttpStatus.OK)
  adjustBalance(@Body() adjustBalanceDto: AdjustBalanceDto): AdjustmentResponseDto {
    return this.toAdjustmentResponse(this.ledgerService.adjustBalance(adjustBalanceDto));
  }

  /**
   * All-or-nothing batch of adjustments.
   *
   * POST /ledger/adjustments/bulk
   */
  @Post('adjustments/bulk')
  @HttpCode(HttpStatus.OK)
  adjustBalances(@Body() bulkAdjustBalancesDto: BulkAdjustBalancesDto): AdjustmentResponseDto[] {
    return this.ledgerService
      .adjustBalances(bulkAdjustBalancesDto.adjustments)
      .map((record) => this.toAdjustmentResponse(record));
  }

  /**
   * Pair identifiers seen in trade history; the ones without a price still
   * need one for unrealized P&L.
   *
   * GET /ledger/pair-identifiers
   */
  @Get('pair-identifiers')
  @HttpCode(HttpStatus.OK)
  getPairIdentifiers(): PairIdentifiersResponseDto {
    return this.queryService.getPairIdentifiers();
  }

  /**
   * Returns current market prices with last update timestamp.
   *
   * GET /ledger/market-prices?pair=XXBTZUSD
   */
  @Get('market-prices')
  @HttpCode(HttpStatus.OK)
  getMarketPrices(@Query('pair') pair?: string): MarketPricesResponseDto {
    const data = this.queryService.getMarketPrices(pair);
    return {
      prices: data.prices,
      lastUpdated: data.lastUpdate.toISOString(),
      source: 'manual',
    };
  }

  /** POST /ledger/market-prices/update */
  @Post('market-prices/update')
  @HttpCode(HttpStatus.OK)
  updatePrice(@Body() updatePriceDto: UpdatePriceDto) {
    this.ledgerService.updatePrice(updatePriceDto.pair, updatePriceDto.price);
    return {
      message: `Price updated for ${updatePriceDto.pair}`,
      pair: updatePriceDto.pair,
      price: updatePriceDto.price,
    };
  }

  /** POST /ledger/market-prices/bulk */
  @Post('market-prices/bulk')
  @HttpCode(HttpStatus.OK)
  bulkUpdatePrices(@Body() bulkUpdatePricesDto: BulkUpdatePricesDto) {
    this.ledgerService.updatePrices(bulkUpdatePricesDto.prices);
    return {
      message: 'Market prices updated',
      updatedPairs: Object.keys(bulkUpdatePricesDto.prices),
      prices: bulkUpdatePricesDto.prices,
    };
  }

  /**
   * Takes prices from an exchange ticker snapshot (last trade, or bid/ask
   * midpoint when configured).
   *
   * POST /ledger/market-prices/ticker
   */
  @Post('market-prices/ticker')
  @HttpCode(HttpStatus.OK)
  applyTicker(@Body() tickerSnapshotDto: TickerSnapshotDto) {
    const result = this.ledgerService.applyTicker(tickerSnapshotDto.ticker);
    return {
      message: 'Ticker prices applied',
      updatedPairs: result.updated,
      ignoredPairs: result.ignored,
    };
  }

  /**
   * Clears trades, adjustments and prices.
   *
   * POST /ledger/reset
   */
  @Post('reset')
  @HttpCode(HttpStatus.OK)
  reset() {
    this.ledgerService.clearAll();
    return { message: 'Ledger reset successfully' };
  }

  private toAdjustmentResponse(record: AdjustmentRecord): AdjustmentResponseDto {
    return {
      id: record.id,
      base: record.base,
      quote: record.quote,
      targetVolume: toPlainString(record.targetVolume),
      previousVolume: toPlainString(record.previousVolume),
      remainingVolume: toPlainString(record.remainingVolume),
      removedVolume: toPlainString(record.removedVolume),
      appliedAt: record.appliedAt.toISOString(),
    };
  }
}
