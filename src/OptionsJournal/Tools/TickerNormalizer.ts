/**
 * TickerNormalizer.ts — Collapse broker symbols to a stable root ticker
 *
 * The root is the grouping key for order batches and the join key between
 * transactions and open positions, so the same underlying must always land on
 * the same string:
 *
 *   /ESH5            → ES      (futures contract code)
 *   ./MESM5 EW3K5    → MES     (futures option, first token only)
 *   .SPXW            → SPX     (weekly option root)
 *   AAPL             → AAPL
 */

// Futures month codes: F G H J K M N Q U V X Z
const FUTURES_CODE = /^([A-Z]{1,4}?)[FGHJKMNQUVXZ]\d{1,2}$/;
const LEADING_LETTERS = /^[A-Z]+/;

const WEEKLY_ROOTS: Record<string, string> = {
  SPXW: "SPX",
  NDXP: "NDX",
  RUTW: "RUT",
  XSPW: "XSP",
};

export function normalizeTicker(raw: string): string {
  const token = raw.trim().split(/\s+/)[0] ?? "";
  let cleaned = token.replace(/\//g, "");
  if (cleaned.startsWith(".")) cleaned = cleaned.slice(1);
  cleaned = cleaned.toUpperCase();

  const futures = FUTURES_CODE.exec(cleaned);
  if (futures?.[1]) return futures[1];

  const letters = LEADING_LETTERS.exec(cleaned);
  if (!letters) return cleaned;

  return WEEKLY_ROOTS[letters[0]] ?? letters[0];
}
