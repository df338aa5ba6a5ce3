import { parseTradeRecord } from './trade-record.parser';
import { TradeRecord, TradeSide } from './entities/trade-record.entity';

describe('parseTradeRecord', () => {
  const expectParsed = (raw: unknown): TradeRecord => {
    const result = parseTradeRecord(raw);
    if (!result.ok) {
      throw new Error(`expected a parsed record, got: ${result.reason}`);
    }
    return result.record;
  };

  const expectRejected = (raw: unknown): string => {
    const result = parseTradeRecord(raw);
    if (result.ok) {
      throw new Error('expected the record to be rejected');
    }
    return result.reason;
  };

  it('should parse a complete exchange record', () => {
    const record = expectParsed({
      txid: 'TXID-0001',
      pair: ' XXBTZUSD ',
      type: 'Buy',
      vol: '0.50000000',
      price: '30000.1',
      cost: '15000.05',
      fee: '24.00008',
      time: 1700000000.1234,
    });

    expect(record.tradeId).toBe('TXID-0001');
    expect(record.pairIdentifier).toBe('XXBTZUSD');
    expect(record.side).toBe(TradeSide.BUY);
    expect(record.volume.toString()).toBe('0.5');
    expect(record.price.toString()).toBe('30000.1');
    expect(record.cost.toString()).toBe('15000.05');
    expect(record.fee.toString()).toBe('24.00008');
    expect(record.timestamp).toBe(1700000000.1234);
  });

  it('should derive cost from volume × price when missing', () => {
    const record = expectParsed({ pair: 'ETHUSD', type: 'sell', vol: '2', price: '1500.5' });

    expect(record.side).toBe(TradeSide.SELL);
    expect(record.cost.toString()).toBe('3001');
  });

  it('should read missing values as zero', () => {
    const record = expectParsed({ type: 'buy' });

    expect(record.pairIdentifier).toBe('');
    expect(record.volume.toString()).toBe('0');
    expect(record.price.toString()).toBe('0');
    expect(record.cost.toString()).toBe('0');
    expect(record.fee.toString()).toBe('0');
    expect(record.timestamp).toBe(0);
    expect(record.tradeId).toBeUndefined();
  });

  it('should accept numbers as well as text', () => {
    const record = expectParsed({ pair: 'XETHZUSD', type: 'buy', vol: 0.1, price: 2000, fee: 0.2, time: '1700000000' });

    expect(record.volume.toString()).toBe('0.1');
    expect(record.cost.toString()).toBe('200');
    expect(record.timestamp).toBe(1700000000);
  });

  it('should reject non-object records', () => {
    expect(expectRejected(null)).toBe('record is not an object');
    expect(expectRejected('buy 1 BTC')).toBe('record is not an object');
    expect(expectRejected([1, 2])).toBe('record is not an object');
  });

  it('should reject an unknown side', () => {
    expect(expectRejected({ pair: 'XXBTZUSD', type: 'transfer', vol: '1' })).toBe('unknown side: transfer');
    expect(expectRejected({ pair: 'XXBTZUSD', vol: '1' })).toBe('unknown side: undefined');
  });

  it('should reject a pair that is not text', () => {
    expect(expectRejected({ pair: 42, type: 'buy' })).toBe('pair is not a string');
  });

  it('should reject misformatted numeric fields', () => {
    expect(expectRejected({ pair: 'XXBTZUSD', type: 'buy', vol: 'one' })).toBe('vol is not a decimal: one');
    expect(expectRejected({ pair: 'XXBTZUSD', type: 'buy', vol: '1', price: 'NaN' })).toBe(
      'price is not a decimal: NaN',
    );
    expect(expectRejected({ pair: 'XXBTZUSD', type: 'buy', vol: '1', cost: {} })).toBe(
      'cost is not a decimal: [object Object]',
    );
    expect(expectRejected({ pair: 'XXBTZUSD', type: 'buy', vol: '1', time: 'yesterday' })).toBe(
      'time is not numeric: yesterday',
    );
  });

  it('should reject negative amounts', () => {
    expect(expectRejected({ pair: 'XXBTZUSD', type: 'sell', vol: '-1' })).toBe('vol must not be negative: -1');
    expect(expectRejected({ pair: 'XXBTZUSD', type: 'sell', vol: '1', fee: '-0.1' })).toBe(
      'fee must not be negative: -0.1',
    );
  });
});
