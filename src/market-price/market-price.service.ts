import { BadRequestException, Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import Decimal from 'decimal.js';
import { ledgerConfig } from '../config/ledger.config';
import { safeDivide, tryParseDecimal } from '../common/utils/decimal.util';

// Exchange ticker entry: first element of each array is the price.
// Fields arrive unchecked from the request body.
export interface TickerEntry {
  a?: unknown;   // ask, e.g. ["61010.0", "1", "1.000"]
  b?: unknown;   // bid
  c?: unknown;   // last trade
}

export interface TickerApplyResult {
  updated: string[];
  ignored: string[];
}

/**
 * Current prices keyed by raw pair identifier (e.g. XXBTZUSD).
 * Fed by clients that already fetched them; nothing is fetched here.
 * An absent entry means "no price available".
 */
@Injectable()
export class MarketPriceService {
  private readonly logger = new Logger(MarketPriceService.name);
  private latestPrices: Map<string, Decimal> = new Map();
  private lastPriceUpdate: Date = new Date();

  constructor(
    @Inject(ledgerConfig.KEY)
    private readonly config: ConfigType<typeof ledgerConfig>,
  ) {}

  /** O(1) lookup - returns undefined if pair not tracked */
  getPrice(pairIdentifier: string): Decimal | undefined {
    return this.latestPrices.get(pairIdentifier);
  }

  /** Snapshot for the valuation step */
  getPriceMap(): ReadonlyMap<string, Decimal> {
    return new Map(this.latestPrices);
  }

  /**
   * Updates single pair price.
   * @throws BadRequestException if price is not a positive decimal
   */
  updatePrice(pairIdentifier: string, price: string | number): void {
    this.latestPrices.set(pairIdentifier, this.requirePositive(pairIdentifier, price));
    this.lastPriceUpdate = new Date();
  }

  /**
   * Batch price updates - validates all before applying.
   * @throws BadRequestException on the first invalid price; nothing is applied
   */
  updatePrices(prices: Record<string, string | number>): void {
    const validated = Object.entries(prices).map(
      ([pairIdentifier, price]) => [pairIdentifier, this.requirePositive(pairIdentifier, price)] as const,
    );
    validated.forEach(([pairIdentifier, price]) => this.latestPrices.set(pairIdentifier, price));
    this.lastPriceUpdate = new Date();
  }

  /**
   * Takes prices from an exchange ticker snapshot: last trade price, or the
   * bid/ask midpoint when mid pricing is configured. Entries without a
   * usable positive price are ignored.
   */
  applyTicker(ticker: Record<string, unknown>): TickerApplyResult {
    const result: TickerApplyResult = { updated: [], ignored: [] };

    for (const [pairIdentifier, entry] of Object.entries(ticker)) {
      if (!isTickerEntry(entry)) {
        result.ignored.push(pairIdentifier);
        continue;
      }
      const price = this.config.useMidPrice ? midPrice(entry) : firstPrice(entry.c);
      if (!price || price.lessThanOrEqualTo(0)) {
        result.ignored.push(pairIdentifier);
        continue;
      }
      this.latestPrices.set(pairIdentifier, price);
      result.updated.push(pairIdentifier);
    }

    if (result.ignored.length > 0) {
      this.logger.warn(`No usable ticker price for ${result.ignored.join(', ')}`);
    }
    this.lastPriceUpdate = new Date();
    return result;
  }

  /** Timestamp of most recent price update */
  getLastUpdateTime(): Date {
    return this.lastPriceUpdate;
  }

  hasPrice(pairIdentifier: string): boolean {
    return this.latestPrices.has(pairIdentifier);
  }

  /** Returns all pair identifiers with known prices */
  getAvailablePairs(): string[] {
    return Array.from(this.latestPrices.keys());
  }

  /** Drops every price */
  clearAllPrices(): void {
    this.latestPrices.clear();
    this.lastPriceUpdate = new Date();
  }

  private requirePositive(pairIdentifier: string, price: string | number): Decimal {
    const parsed = tryParseDecimal(price);
    if (!parsed || parsed.lessThanOrEqualTo(0)) {
      throw new BadRequestException(`Price must be positive, got ${price} for ${pairIdentifier}`);
    }
    return parsed;
  }
}

function isTickerEntry(entry: unknown): entry is TickerEntry {
  return typeof entry === 'object' && entry !== null && !Array.isArray(entry);
}

// Only the first element of a price array counts; anything else has no price.
function firstPrice(values: unknown): Decimal | undefined {
  return Array.isArray(values) && values.length > 0 ? tryParseDecimal(values[0]) : undefined;
}

function midPrice(entry: TickerEntry): Decimal | undefined {
  const bid = firstPrice(entry.b);
  const ask = firstPrice(entry.a);
  if (!bid || !ask) {
    return undefined;
  }
  return safeDivide(bid.plus(ask), new Decimal(2));
}
