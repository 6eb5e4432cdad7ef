// Parse BBR byg069Sikringsrumpladser into a whole number of shelter places.
// Returns null for anything non-numeric; floats are truncated toward zero.
export function parseCapacity(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? Math.trunc(value) : null;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (!/^[+-]?\d+$/.test(trimmed)) return null;
    return Number.parseInt(trimmed, 10);
  }
  return null;
}
