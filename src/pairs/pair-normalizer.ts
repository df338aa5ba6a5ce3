// Exchange pair identifiers -> (base, quote).
// Handles legacy fixed-width names (XXBTZUSD, XETHZUSD), plain names (ETHUSD)
// and slash-separated names (ETH/USDT).

export interface TradingPair {
  base: string;
  quote: string;
}

// Legacy tickers mapped to their common form.
const ASSET_ALIASES: ReadonlyArray<[legacy: string, canonical: string]> = [['XBT', 'BTC']];

// Quote currencies recognized as suffixes of plain identifiers, longest first.
const KNOWN_QUOTES: readonly string[] = [
  'USDT', 'USDC', 'PYUSD',
  'USD', 'EUR', 'GBP', 'CAD', 'JPY', 'CHF', 'AUD', 'DAI', 'BTC', 'ETH',
].sort((a, b) => b.length - a.length);

const QUOTE_DELIMITER = 'Z';
const BASE_PREFIX = 'X';
const MIN_LEGACY_LENGTH = 7;

export function normalizePairIdentifier(identifier: string): string {
  let normalized = identifier.replace(/\//g, '').toUpperCase();
  for (const [legacy, canonical] of ASSET_ALIASES) {
    normalized = normalized.split(legacy).join(canonical);
  }
  return normalized;
}

/**
 * Splits a raw pair identifier into base and quote symbols.
 * Never throws: identifiers with no recognizable split come back with a
 * best-effort guess, and an empty base or quote marks a suspect key.
 */
export function parsePair(identifier: string): TradingPair {
  if (!identifier) {
    return { base: '', quote: '' };
  }
  const p = normalizePairIdentifier(identifier);

  // Legacy BASEZQUOTE form, e.g. XETHZUSD
  if (p.includes(QUOTE_DELIMITER) && p.length >= MIN_LEGACY_LENGTH) {
    const i = p.lastIndexOf(QUOTE_DELIMITER);
    let left = p.slice(0, i);
    const right = p.slice(i + 1);
    if (left && right && right.length >= 3 && right.length <= 4) {
      if (left.startsWith(BASE_PREFIX) && left.length >= 2) {
        left = left.slice(1);
      }
      return { base: left, quote: right };
    }
  }

  const knownQuote = KNOWN_QUOTES.find((q) => p.length > q.length && p.endsWith(q));
  if (knownQuote) {
    return { base: p.slice(0, -knownQuote.length), quote: knownQuote };
  }

  for (const quoteLength of [4, 3]) {
    if (p.length > quoteLength) {
      return { base: p.slice(0, -quoteLength), quote: p.slice(-quoteLength) };
    }
  }
  return { base: p, quote: '' };
}

/** Map key for a (base, quote) pair. Separator cannot occur in normalized symbols. */
export function pairKey(base: string, quote: string): string {
  return `${base}/${quote}`;
}

export function isSuspectPair(pair: TradingPair): boolean {
  return pair.base === '' || pair.quote === '';
}
