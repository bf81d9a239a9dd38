export function truncate(text: string, maxLength: number): string {
  if (maxLength < 1) {
    return "";
  }
  if (text.length <= maxLength) {
    return text;
  }
  if (maxLength < 4) {
    return text.slice(0, maxLength);
  }
  return text.slice(0, maxLength - 3) + "...";
}

/** First `maxLength` characters, with "..." appended when anything was cut. */
export function preview(text: string, maxLength = 200): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}

export function formatArguments(args: Record<string, unknown>): string {
  return Object.entries(args)
    .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
    .join(", ");
}

/** Renders a decimal quantity with at least one fractional digit: 25 as "25.0", 0.92 as "0.92". */
export function formatDecimal(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}
