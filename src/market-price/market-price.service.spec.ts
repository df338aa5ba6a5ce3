import { BadRequestException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { LedgerConfig, ledgerConfig } from '../config/ledger.config';
import { MarketPriceService } from './market-price.service';

describe('MarketPriceService', () => {
  let service: MarketPriceService;

  const createService = async (overrides: Partial<LedgerConfig> = {}): Promise<MarketPriceService> => {
    const config: LedgerConfig = { includeFeesInCost: true, useMidPrice: false, ...overrides };
    const module: TestingModule = await Test.createTestingModule({
      providers: [MarketPriceService, { provide: ledgerConfig.KEY, useValue: config }],
    }).compile();
    return module.get<MarketPriceService>(MarketPriceService);
  };

  beforeEach(async () => {
    service = await createService();
  });

  describe('Initialization', () => {
    it('should start without prices', () => {
      expect(service.getAvailablePairs()).toHaveLength(0);
      expect(service.getPrice('XXBTZUSD')).toBeUndefined();
    });
  });

  describe('updatePrice', () => {
    it('should store the price as an exact decimal', () => {
      service.updatePrice('XXBTZUSD', '61000.123456789');
      expect(service.getPrice('XXBTZUSD')?.toString()).toBe('61000.123456789');
    });

    it('should accept numeric input', () => {
      service.updatePrice('XETHZUSD', 2400.5);
      expect(service.getPrice('XETHZUSD')?.toString()).toBe('2400.5');
    });

    it('should throw for zero or negative price', () => {
      expect(() => service.updatePrice('XXBTZUSD', '0')).toThrow(BadRequestException);
      expect(() => service.updatePrice('XXBTZUSD', '-100')).toThrow('Price must be positive');
    });

    it('should throw for non-numeric price', () => {
      expect(() => service.updatePrice('XXBTZUSD', 'abc')).toThrow('Price must be positive, got abc for XXBTZUSD');
    });

    it('should move the last update time forward', () => {
      const before = service.getLastUpdateTime();
      service.updatePrice('XXBTZUSD', '1');
      expect(service.getLastUpdateTime().getTime()).toBeGreaterThanOrEqual(before.getTime());
    });
  });

  describe('updatePrices', () => {
    it('should update multiple prices at once', () => {
      service.updatePrices({ XXBTZUSD: '61000', XETHZUSD: '2400' });

      expect(service.getPrice('XXBTZUSD')?.toString()).toBe('61000');
      expect(service.getPrice('XETHZUSD')?.toString()).toBe('2400');
    });

    it('should apply nothing if any price is invalid', () => {
      expect(() => service.updatePrices({ XXBTZUSD: '61000', XETHZUSD: '-1' })).toThrow(BadRequestException);

      expect(service.hasPrice('XXBTZUSD')).toBe(false);
      expect(service.hasPrice('XETHZUSD')).toBe(false);
    });
  });

  describe('applyTicker', () => {
    const ticker = {
      XXBTZUSD: { a: ['61010.0', '1', '1.000'], b: ['61000.0', '2', '2.000'], c: ['61004.5', '0.1'] },
      XETHZUSD: { a: ['2401'], b: ['2399'], c: ['2400.25'] },
      BROKEN: { a: [], b: [], c: ['0'] },
    };

    it('should use the last trade price by default', () => {
      const result = service.applyTicker(ticker);

      expect(result).toEqual({ updated: ['XXBTZUSD', 'XETHZUSD'], ignored: ['BROKEN'] });
      expect(service.getPrice('XXBTZUSD')?.toString()).toBe('61004.5');
      expect(service.getPrice('XETHZUSD')?.toString()).toBe('2400.25');
      expect(service.hasPrice('BROKEN')).toBe(false);
    });

    it('should use the bid/ask midpoint when configured', async () => {
      service = await createService({ useMidPrice: true });

      const result = service.applyTicker(ticker);

      expect(result.ignored).toEqual(['BROKEN']);
      expect(service.getPrice('XXBTZUSD')?.toString()).toBe('61005');
      expect(service.getPrice('XETHZUSD')?.toString()).toBe('2400');
    });

    it('should ignore a last price that is not an array', () => {
      const result = service.applyTicker({ XXBTZUSD: { c: '61000.5' } });

      expect(result).toEqual({ updated: [], ignored: ['XXBTZUSD'] });
      expect(service.hasPrice('XXBTZUSD')).toBe(false);
    });

    it('should ignore entries that are not objects', () => {
      const result = service.applyTicker({ XXBTZUSD: null, XETHZUSD: ['2400'], SOLUSD: { c: ['150'] } });

      expect(result).toEqual({ updated: ['SOLUSD'], ignored: ['XXBTZUSD', 'XETHZUSD'] });
      expect(service.getAvailablePairs()).toEqual(['SOLUSD']);
    });

    it('should ignore an entry without bid or ask when using the midpoint', async () => {
      service = await createService({ useMidPrice: true });

      const result = service.applyTicker({
        XXBTZUSD: { b: ['61000'], c: ['61004.5'] },
        XETHZUSD: { a: '2401', b: ['2399'] },
      });

      expect(result).toEqual({ updated: [], ignored: ['XXBTZUSD', 'XETHZUSD'] });
      expect(service.getAvailablePairs()).toEqual([]);
    });
  });

  describe('getPriceMap', () => {
    it('should return a snapshot that does not follow later updates', () => {
      service.updatePrice('XXBTZUSD', '100');
      const snapshot = service.getPriceMap();

      service.updatePrice('XXBTZUSD', '200');

      expect(snapshot.get('XXBTZUSD')?.toString()).toBe('100');
      expect(service.getPriceMap().get('XXBTZUSD')?.toString()).toBe('200');
    });
  });

  describe('clearAllPrices', () => {
    it('should drop every price', () => {
      service.updatePrices({ XXBTZUSD: '61000', XETHZUSD: '2400' });

      service.clearAllPrices();

      expect(service.getAvailablePairs()).toEqual([]);
    });
  });
});
