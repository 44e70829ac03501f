import {
  CANONICAL_UNIT,
  MASS_TO_G,
  VOLUME_TO_ML,
  isMassUnit,
  isVolumeUnit,
  type UnitFamily,
  type UnitPhase,
} from '@domain/constants/units.ts'

export interface CanonicalQuantity {
  value: number
  family: UnitFamily
  unit: string | null      // 'g' / 'ml', or the original unit for unknown units
}

/** Lower-cased, trimmed form used for table lookups and unit comparison. */
export function normalizeUnit(unit: string | null | undefined): string {
  return (unit ?? '').trim().toLowerCase()
}

/** Classify any unit string. Empty and count units are 'unknown'. */
export function classifyUnit(unit: string | null | undefined): UnitFamily {
  const key = normalizeUnit(unit)
  if (isMassUnit(key)) return 'mass'
  if (isVolumeUnit(key)) return 'volume'
  return 'unknown'
}

/** Mass is dry, volume is wet. */
export function unitPhase(unit: string | null | undefined): UnitPhase {
  const family = classifyUnit(unit)
  if (family === 'mass') return 'dry'
  if (family === 'volume') return 'wet'
  return 'unknown'
}

function factorFor(key: string, family: UnitFamily): number {
  if (family === 'mass') return MASS_TO_G[key]
  if (family === 'volume') return VOLUME_TO_ML[key]
  return 1
}

export function toCanonical(value: number, unit: string | null | undefined): CanonicalQuantity {
  const key = normalizeUnit(unit)
  const family = classifyUnit(key)
  if (family === 'unknown') return { value, family, unit: unit ?? null }
  return { value: value * factorFor(key, family), family, unit: CANONICAL_UNIT[family] }
}

export function fromCanonical(value: number, targetUnit: string | null | undefined): number {
  const key = normalizeUnit(targetUnit)
  const family = classifyUnit(key)
  if (family === 'unknown') return value
  return value / factorFor(key, family)
}

/** True when both units belong to the same known family. */
export function isConvertible(fromUnit: string | null | undefined, toUnit: string | null | undefined): boolean {
  const from = classifyUnit(fromUnit)
  return from !== 'unknown' && from === classifyUnit(toUnit)
}

/**
 * Convert a value between two units of the same family.
 *
 * Anything else (different families, or an unknown unit on either side) returns
 * `value` unchanged. Callers that cannot accept that must check `isConvertible`.
 */
export function convert(
  value: number,
  fromUnit: string | null | undefined,
  toUnit: string | null | undefined,
): number {
  if (!isConvertible(fromUnit, toUnit)) return value
  return fromCanonical(toCanonical(value, fromUnit).value, toUnit)
}
