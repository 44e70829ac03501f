import type { PantryItem } from '@domain/models/PantryItem.ts'

/**
 * Absolute cutoff for an item, or null when it is exempt from replenishment.
 * Thresholds in (0, 1] are a fraction of the baseline, anything above 1 is an
 * amount in the item's own unit.
 */
export function effectiveThreshold(threshold: number | null, baseAmount: number | null): number | null {
  const value = threshold ?? 0
  if (value <= 0 || !Number.isFinite(value)) return null
  const cutoff = value <= 1 ? value * (baseAmount ?? 0) : value
  return cutoff > 0 ? cutoff : null
}

export function needsReplenishment(amount: number, cutoff: number | null): boolean {
  return cutoff !== null && amount <= cutoff
}

/** Baseline after observing `amount`: unset or lower baselines rise to it. */
export function nextBaseline(amount: number, baseAmount: number | null): number {
  return baseAmount === null || amount > baseAmount ? amount : baseAmount
}

export function clampNonNegative(value: number): number {
  return value > 0 ? value : 0
}

/** Compact number for notes: six significant digits, no trailing zeros. */
export function formatAmount(value: number): string {
  return String(Number(value.toPrecision(6)))
}

export function replenishmentNote(item: Pick<PantryItem, 'unit'>, remaining: number, cutoff: number): string {
  const unit = item.unit ? ` ${item.unit}` : ''
  return `Auto-added: remaining ${formatAmount(remaining)}${unit} ≤ threshold ${formatAmount(cutoff)}`
}
