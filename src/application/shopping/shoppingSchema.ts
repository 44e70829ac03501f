import { OPEN_STATUS, type ShoppingCandidate, type ShoppingField } from '@domain/models/ShoppingListEntry.ts'
import type { ShoppingInsert } from '@application/ports/stores.ts'

/**
 * Project a candidate onto the fields a shopping list supports.
 * Unsupported fields are dropped; status falls back to pending.
 */
export function projectCandidate(
  candidate: ShoppingCandidate,
  fields: ReadonlySet<ShoppingField>,
): ShoppingInsert {
  const insert: ShoppingInsert = { name: candidate.name }

  if (fields.has('brand')) insert.brand = candidate.brand
  if (fields.has('quantity')) insert.quantity = candidate.quantity
  if (fields.has('unit')) insert.unit = candidate.unit
  if (fields.has('category')) insert.category = candidate.category
  if (fields.has('notes')) insert.notes = candidate.notes
  if (fields.has('store')) insert.store = candidate.store
  if (fields.has('status')) insert.status = candidate.status || OPEN_STATUS
  if (fields.has('linkedPantryId')) insert.linkedPantryId = candidate.linkedPantryId

  return insert
}

/** Numeric value of a stored quantity; null counts as 0, unparseable text is null. */
export function parseStoredQuantity(quantity: number | string | null | undefined): number | null {
  if (quantity === null || quantity === undefined) return 0
  if (typeof quantity === 'number') return Number.isFinite(quantity) ? quantity : null

  const trimmed = quantity.trim()
  if (!trimmed) return 0
  const parsed = Number(trimmed)
  return Number.isFinite(parsed) ? parsed : null
}
