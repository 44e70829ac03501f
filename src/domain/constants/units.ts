import unitFactors from './unitFactors.json'

export type UnitFamily = 'mass' | 'volume' | 'unknown'
export type UnitPhase = 'dry' | 'wet' | 'unknown'

/** Canonical unit per family. */
export const CANONICAL_UNIT = {
  mass: 'g',
  volume: 'ml',
} as const

/** Mass conversions to grams (canonical unit). Keys are lower-case. */
export const MASS_TO_G: Record<string, number> = unitFactors.mass

/** Volume conversions to milliliters (canonical unit). Keys are lower-case. */
export const VOLUME_TO_ML: Record<string, number> = unitFactors.volume

export function isMassUnit(unit: string): boolean {
  return Object.hasOwn(MASS_TO_G, unit)
}

export function isVolumeUnit(unit: string): boolean {
  return Object.hasOwn(VOLUME_TO_ML, unit)
}
