import { inspect } from "node:util";

export function safeString(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Error) {
    const cause = value.cause === undefined ? "" : ` (cause: ${safeString(value.cause)})`;
    return `${value.name}: ${value.message}${cause}`;
  }
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return value.toString();
  }
  if (value === undefined) return "undefined";
  try {
    const json = JSON.stringify(value);
    if (typeof json === "string") return json;
  } catch {
    // circular or throwing toJSON; fall through to inspect
  }
  try {
    return inspect(value, { depth: 5, breakLength: 120 });
  } catch {
    return "[unstringifiable]";
  }
}

/** Single-line, length-capped rendering of user text for log lines. */
export function logPreview(value: unknown, maxChars = 50): string {
  const flat = safeString(value).replace(/\s+/g, " ").trim();
  return flat.length > maxChars ? `${flat.slice(0, maxChars)}…` : flat;
}
