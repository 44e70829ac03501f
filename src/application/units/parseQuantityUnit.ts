export interface ParsedQuantity {
  value: number
  unit: string
}

/**
 * Parse "2 cups" / "500" / "1.5 fl oz" into a value and a lower-cased unit.
 * Returns null for empty text or a non-numeric leading token.
 */
export function parseQuantityUnit(text: string): ParsedQuantity | null {
  const parts = text.trim().toLowerCase().split(/\s+/).filter(Boolean)
  if (parts.length === 0) return null

  const value = Number(parts[0])
  if (!Number.isFinite(value)) return null

  return { value, unit: parts.slice(1).join(' ') }
}
