import { Test, TestingModule } from '@nestjs/testing';
import Decimal from 'decimal.js';
import { LedgerBook } from '../ledger/ledger-book';
import { ValuationService } from './valuation.service';

describe('ValuationService', () => {
  let service: ValuationService;
  let book: LedgerBook;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [ValuationService],
    }).compile();

    service = module.get<ValuationService>(ValuationService);
    book = new LedgerBook({ includeFeesInCost: true });
  });

  it('should produce the reporting record for a partly sold position', () => {
    book.applyAll([
      { pair: 'XXBTZUSD', type: 'buy', vol: '1.0', price: '9000', fee: '9' },
      { pair: 'XXBTZUSD', type: 'sell', vol: '0.4', price: '10000', fee: '4' },
    ]);

    const rows = service.compute(book, new Map([['XXBTZUSD', new Decimal('11000')]]));

    expect(rows).toEqual([
      {
        asset: 'BTC',
        quote: 'USD',
        totalBought: '1',
        avgBuyPrice: '9009',
        totalSold: '0.4',
        avgSellPrice: '9990',
        netFromHistory: '0.6',
        remainingUnsoldVolume: '0.6',
        avgBuyPriceOfRemaining: '9009',
        feesTotal: '13',
        realizedPnl: '392.4',
        currentPrice: '11000',
        unrealizedPnl: '1194.6', // (11000 − 9009) × 0.6
      },
    ]);
  });

  it('should value each remaining lot at its own cost', () => {
    book.applyAll([
      { pair: 'ETHUSD', type: 'buy', vol: '1', price: '100' },
      { pair: 'ETHUSD', type: 'buy', vol: '2', price: '160' },
    ]);

    const [row] = service.compute(book, new Map([['ETHUSD', new Decimal('150')]]));

    // (150 − 100) × 1 + (150 − 160) × 2
    expect(row.unrealizedPnl).toBe('30');
    expect(row.avgBuyPriceOfRemaining).toBe('140');
  });

  it('should report zero price and zero unrealized P&L when no price is known', () => {
    book.applyAll([{ pair: 'XETHZUSD', type: 'buy', vol: '2', price: '1500' }]);

    const [row] = service.compute(book, new Map());

    expect(row.currentPrice).toBe('0');
    expect(row.unrealizedPnl).toBe('0');
    expect(row.remainingUnsoldVolume).toBe('2');
  });

  it('should report zero unrealized P&L when nothing remains', () => {
    book.applyAll([
      { pair: 'XETHZUSD', type: 'buy', vol: '2', price: '1500' },
      { pair: 'XETHZUSD', type: 'sell', vol: '2', price: '1600' },
    ]);

    const [row] = service.compute(book, new Map([['XETHZUSD', new Decimal('1700')]]));

    expect(row.currentPrice).toBe('1700');
    expect(row.unrealizedPnl).toBe('0');
    expect(row.avgBuyPriceOfRemaining).toBe('0');
    expect(row.realizedPnl).toBe('200');
  });

  it('should report zero averages where there is no volume', () => {
    book.applyAll([{ pair: 'XXBTZUSD', type: 'sell', vol: '0', price: '100' }]);

    const [row] = service.compute(book, new Map());

    expect(row.avgBuyPrice).toBe('0');
    expect(row.avgSellPrice).toBe('0');
    expect(row.avgBuyPriceOfRemaining).toBe('0');
  });

  it('should reflect a shrink in remaining figures only', () => {
    book.applyAll([
      { pair: 'XXBTZUSD', type: 'buy', vol: '1', price: '100' },
      { pair: 'XXBTZUSD', type: 'buy', vol: '1', price: '200' },
    ]);
    book.get('BTC', 'USD')?.shrinkToTarget(new Decimal('0.5'));

    const [row] = service.compute(book, new Map([['XXBTZUSD', new Decimal('300')]]));

    expect(row.totalBought).toBe('2');
    expect(row.netFromHistory).toBe('2');
    expect(row.remainingUnsoldVolume).toBe('0.5');
    expect(row.avgBuyPriceOfRemaining).toBe('200');
    expect(row.realizedPnl).toBe('0');
    expect(row.unrealizedPnl).toBe('50');
  });

  it('should sort rows by asset, then quote', () => {
    book.applyAll([
      { pair: 'XXBTZUSD', type: 'buy', vol: '1', price: '1' },
      { pair: 'XETHZUSD', type: 'buy', vol: '1', price: '1' },
      { pair: 'XXBTZEUR', type: 'buy', vol: '1', price: '1' },
    ]);

    const rows = service.compute(book, new Map());

    expect(rows.map((row) => [row.asset, row.quote])).toEqual([
      ['BTC', 'EUR'],
      ['BTC', 'USD'],
      ['ETH', 'USD'],
    ]);
  });

  it('should not change the book', () => {
    book.applyAll([{ pair: 'XXBTZUSD', type: 'buy', vol: '1', price: '100' }]);

    service.compute(book, new Map([['XXBTZUSD', new Decimal('150')]]));
    const rows = service.compute(book, new Map([['XXBTZUSD', new Decimal('150')]]));

    expect(rows[0].remainingUnsoldVolume).toBe('1');
    expect(rows[0].unrealizedPnl).toBe('50');
  });
});
