/**
 * AMQP header field values to strings.
 *
 * amqplib decodes header tables into plain JS values: numbers for every
 * integer, float and timestamp type, booleans, strings, Buffers for byte
 * arrays, arrays, nested objects for tables, null for void, and a tagged
 * object for decimals. Scalars become strings; containers and byte arrays
 * have no string form and are dropped.
 */

import type { Headers } from "@hare/dispatch";

/** amqplib's decoded form of an AMQP decimal field. */
interface AmqpDecimal {
  "!": "decimal";
  value: { places: number; digits: number };
}

function isDecimal(value: unknown): value is AmqpDecimal {
  if (typeof value !== "object" || value === null) return false;
  if (!("!" in value) || value["!"] !== "decimal" || !("value" in value)) {
    return false;
  }
  const inner = value.value;
  return (
    typeof inner === "object" &&
    inner !== null &&
    "digits" in inner &&
    typeof inner.digits === "number"
  );
}

/**
 * The string form of one header value, or undefined when it has none.
 * Decimals render their unscaled digits.
 */
export function headerValueToString(value: unknown): string | undefined {
  switch (typeof value) {
    case "string":
      return value;
    case "number":
    case "bigint":
    case "boolean":
      return String(value);
    default:
      break;
  }
  if (isDecimal(value)) {
    return String(value.value.digits);
  }
  return undefined;
}

/** Convert a decoded header table, keeping the order amqplib produced. */
export function headersFromTable(
  table: Record<string, unknown> | undefined,
): Headers {
  const headers = new Map<string, string>();
  if (!table) return headers;
  for (const [key, raw] of Object.entries(table)) {
    const value = headerValueToString(raw);
    if (value !== undefined) {
      headers.set(key, value);
    }
  }
  return headers;
}
