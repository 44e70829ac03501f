import type { PantryItem } from '@domain/models/PantryItem.ts'
import { effectiveThreshold, needsReplenishment } from '@application/consumption/threshold.ts'

/** Items at or below their cutoff; items without one count as low once empty. */
export function isLowStock(item: PantryItem): boolean {
  const cutoff = effectiveThreshold(item.threshold, item.baseAmount)
  if (cutoff === null) return item.amount <= 0
  return needsReplenishment(item.amount, cutoff)
}

export function listLowStockItems(items: PantryItem[]): PantryItem[] {
  return items.filter(isLowStock)
}
