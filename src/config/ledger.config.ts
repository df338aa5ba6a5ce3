import { registerAs } from '@nestjs/config';

// Accounting policy for the session's ledger book.
export interface LedgerConfig {
  includeFeesInCost: boolean;       // buy cost includes fees, sell proceeds are net of fees
  quoteFilter?: ReadonlySet<string>; // unset: analyze every quote currency
  useMidPrice: boolean;             // ticker price: (bid + ask) / 2 instead of last trade
}

export function parseBooleanFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  return normalized === 'true' || normalized === '1';
}

/** "usd, usdt" -> {USD, USDT}; blank -> undefined */
export function parseQuoteFilter(value: string | undefined): ReadonlySet<string> | undefined {
  const quotes = (value ?? '')
    .split(',')
    .map((quote) => quote.trim().toUpperCase())
    .filter((quote) => quote.length > 0);
  return quotes.length > 0 ? new Set(quotes) : undefined;
}

export const ledgerConfig = registerAs(
  'ledger',
  (): LedgerConfig => ({
    includeFeesInCost: parseBooleanFlag(process.env.LEDGER_INCLUDE_FEES_IN_COST, true),
    quoteFilter: parseQuoteFilter(process.env.LEDGER_QUOTE_FILTER),
    useMidPrice: parseBooleanFlag(process.env.LEDGER_USE_MIDPRICE, false),
  }),
);
