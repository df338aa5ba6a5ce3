import { Controller, Get } from '@nestjs/common';
import { HealthResponse } from './common/interfaces/health.interface';
import { LedgerQueryService } from './ledger/ledger-query.service';

@Controller()
export class AppController {
  constructor(private readonly queryService: LedgerQueryService) {}

  /** GET /health - liveness plus a count of session state */
  @Get('health')
  getHealth(): HealthResponse {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      service: 'trade-ledger-pnl',
      ledgers: this.queryService.getLedgerCount(),
      ingestedTradeIds: this.queryService.getTradeIdCount(),
    };
  }

  @Get()
  getRoot() {
    return {
      message: 'FIFO trade ledger and P&L service',
      version: '1.0.0',
      endpoints: {
        health: '/health',
        trades: '/ledger/trades',
        report: '/ledger/report',
        lots: '/ledger/lots/:base/:quote',
        adjustments: '/ledger/adjustments',
        pairIdentifiers: '/ledger/pair-identifiers',
        marketPrices: '/ledger/market-prices',
        reset: '/ledger/reset',
      },
    };
  }
}
