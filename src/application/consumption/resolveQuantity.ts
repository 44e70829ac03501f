import { classifyUnit, convert, isConvertible, normalizeUnit } from '@application/units/convertUnit.ts'
import type { UnitPolicy } from './context.ts'

/**
 * Express `quantity` (in `fromUnit`) in the pantry item's unit, or null when the
 * ingredient cannot be deducted from that item.
 */
export function resolveQuantity(
  quantity: number,
  fromUnit: string | null,
  toUnit: string | null,
  policy: UnitPolicy,
): number | null {
  if (isConvertible(fromUnit, toUnit)) return convert(quantity, fromUnit, toUnit)
  if (normalizeUnit(fromUnit) === normalizeUnit(toUnit)) return quantity
  if (policy === 'strict') return null

  const from = classifyUnit(fromUnit)
  const to = classifyUnit(toUnit)
  return from !== 'unknown' && to !== 'unknown' ? null : quantity
}
