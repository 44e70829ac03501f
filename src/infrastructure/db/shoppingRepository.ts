import {
  SHOPPING_FIELDS,
  isOpenStatus,
  type ShoppingField,
  type ShoppingListEntry,
} from '@domain/models/ShoppingListEntry.ts'
import type { ShoppingInsert, ShoppingListStore } from '@application/ports/stores.ts'
import type { LarderDB } from './database.ts'

export interface ShoppingRepository extends ShoppingListStore {
  list(): Promise<ShoppingListEntry[]>
  listOpen(): Promise<ShoppingListEntry[]>
}

/**
 * Shopping list backed by the `shoppingList` table. `fields` names the optional
 * columns this deployment keeps; anything else is stored as null and never read.
 */
export function createShoppingRepository(
  db: LarderDB,
  fields: ReadonlySet<ShoppingField> = new Set(SHOPPING_FIELDS),
): ShoppingRepository {
  const isOpen = (entry: ShoppingListEntry) => !fields.has('status') || isOpenStatus(entry.status)
  const keep = <K extends ShoppingField>(field: K, value: ShoppingListEntry[K] | undefined) =>
    fields.has(field) ? value ?? null : null

  return {
    fields,

    async getById(id: number): Promise<ShoppingListEntry | undefined> {
      return db.shoppingList.get(id)
    },

    async list(): Promise<ShoppingListEntry[]> {
      return db.shoppingList.orderBy('createdAt').toArray()
    },

    async listOpen(): Promise<ShoppingListEntry[]> {
      return db.shoppingList.orderBy('createdAt').filter(isOpen).toArray()
    },

    async findOpenByPantryId(pantryId: number): Promise<ShoppingListEntry | undefined> {
      return db.shoppingList.where('linkedPantryId').equals(pantryId).filter(isOpen).first()
    },

    async findOpenByNameUnit(name: string, unit: string | null): Promise<ShoppingListEntry | undefined> {
      const wantedUnit = unit ?? ''
      return db.shoppingList
        .where('name')
        .equals(name)
        .filter((entry) => isOpen(entry) && (!fields.has('unit') || (entry.unit ?? '') === wantedUnit))
        .first()
    },

    async insert(entry: ShoppingInsert): Promise<number> {
      return db.shoppingList.add({
        name: entry.name,
        brand: keep('brand', entry.brand),
        quantity: keep('quantity', entry.quantity),
        unit: keep('unit', entry.unit),
        category: keep('category', entry.category),
        notes: keep('notes', entry.notes),
        store: keep('store', entry.store),
        status: keep('status', entry.status),
        linkedPantryId: keep('linkedPantryId', entry.linkedPantryId),
        createdAt: new Date().toISOString(),
      })
    },

    async setQuantity(id: number, quantity: number): Promise<void> {
      await db.shoppingList.update(id, { quantity })
    },

    async setStatus(id: number, status: string): Promise<void> {
      await db.shoppingList.update(id, { status })
    },

    async remove(id: number): Promise<void> {
      await db.shoppingList.delete(id)
    },
  }
}
