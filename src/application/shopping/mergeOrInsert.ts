import type { ShoppingCandidate, ShoppingListEntry } from '@domain/models/ShoppingListEntry.ts'
import type { ShoppingListStore } from '@application/ports/stores.ts'
import { parseStoredQuantity, projectCandidate } from './shoppingSchema.ts'

export type MergeOutcome = 'inserted' | 'incremented' | 'matched'

async function findOpenMatch(
  store: ShoppingListStore,
  candidate: ShoppingCandidate,
): Promise<ShoppingListEntry | undefined> {
  if (candidate.linkedPantryId !== null && store.fields.has('linkedPantryId')) {
    return store.findOpenByPantryId(candidate.linkedPantryId)
  }
  return store.findOpenByNameUnit(candidate.name, candidate.unit)
}

/**
 * Add a candidate to the shopping list without creating a second open entry
 * for the same item.
 *
 * An open entry linked to the same pantry item (or, without a link, with the
 * same name and unit) has its quantity increased by the candidate's; nothing
 * else on it changes. If that quantity is not numeric the match still counts and
 * nothing is written. Otherwise the candidate is inserted.
 */
export async function mergeOrInsert(
  store: ShoppingListStore,
  candidate: ShoppingCandidate,
): Promise<MergeOutcome> {
  const existing = await findOpenMatch(store, candidate)

  if (existing) {
    if (!store.fields.has('quantity')) return 'matched'

    const current = parseStoredQuantity(existing.quantity)
    if (current === null) return 'matched'

    await store.setQuantity(existing.id, current + candidate.quantity)
    return 'incremented'
  }

  await store.insert(projectCandidate(candidate, store.fields))
  return 'inserted'
}
