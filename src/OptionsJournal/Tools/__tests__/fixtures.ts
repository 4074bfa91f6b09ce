import { mkdtempSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { stringify as csvStringify } from "csv-stringify/sync";
import type { Intent, LegEvent, OptionType, Side } from "../Types";

export interface EventFields {
  intent?: Intent;
  side?: Side;
  type?: OptionType;
  strike?: number;
  expiry?: string;
  root?: string;
  quantity?: number;
  price?: number;
  fees?: number;
  grossValue?: number;
  orderId?: string | null;
  tradeDate?: string;
}

/** Cash comes in when opening a short or closing a long */
export function legEvent(fields: EventFields = {}): LegEvent {
  const intent = fields.intent ?? "open";
  const side = fields.side ?? "short";
  const quantity = fields.quantity ?? 1;
  const price = fields.price ?? 1.5;
  const sign = (intent === "open") === (side === "short") ? 1 : -1;
  const root = fields.root ?? "SPX";

  return {
    instrument: {
      root,
      type: fields.type ?? "put",
      strike: fields.strike ?? 100,
      expiry: fields.expiry ?? "2025-04-17",
    },
    intent,
    side,
    quantity,
    price,
    fees: fields.fees ?? 0,
    grossValue: fields.grossValue ?? sign * price * quantity,
    multiplier: 100,
    orderId: fields.orderId === undefined ? "1" : fields.orderId,
    tradeDate: fields.tradeDate ?? "2025-03-14",
    symbol: root,
  };
}

export function expiryEvent(fields: EventFields = {}): LegEvent {
  const expiry = fields.expiry ?? "2025-04-17";
  return legEvent({ ...fields, intent: "close", side: "short", price: 0, grossValue: 0, orderId: null, expiry, tradeDate: fields.tradeDate ?? expiry });
}

export function tempDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), `${prefix}-`));
}

export const TRANSACTION_COLUMNS = [
  "Date",
  "Type",
  "Sub Type",
  "Action",
  "Symbol",
  "Instrument Type",
  "Value",
  "Quantity",
  "Average Price",
  "Commissions",
  "Fees",
  "Multiplier",
  "Root Symbol",
  "Underlying Symbol",
  "Expiration Date",
  "Strike Price",
  "Call or Put",
  "Order #",
];

export function toCsv(rows: Record<string, string>[], columns: string[]): string {
  return csvStringify(rows, { header: true, columns });
}
