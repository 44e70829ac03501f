import type { NewPantryItem, PantryItem } from '@domain/models/PantryItem.ts'
import type { PantryStore } from '@application/ports/stores.ts'
import type { LarderDB } from './database.ts'

function byNameThenBrand(a: PantryItem, b: PantryItem): number {
  const name = a.name.toLowerCase().localeCompare(b.name.toLowerCase())
  if (name !== 0) return name
  return (a.brand ?? '').localeCompare(b.brand ?? '')
}

export interface PantryRepository extends PantryStore {
  list(): Promise<PantryItem[]>
  search(query: string): Promise<PantryItem[]>
  update(id: number, changes: Partial<NewPantryItem>): Promise<void>
  remove(id: number): Promise<void>
}

export function createPantryRepository(db: LarderDB): PantryRepository {
  return {
    async getById(id: number): Promise<PantryItem | undefined> {
      return db.pantryItems.get(id)
    },

    async findByNameBrand(name: string, brand: string | null): Promise<PantryItem | undefined> {
      const wantedName = name.trim().toLowerCase()
      const wantedBrand = (brand ?? '').trim().toLowerCase()
      return db.pantryItems
        .filter((item) =>
          item.name.trim().toLowerCase() === wantedName &&
          (item.brand ?? '').trim().toLowerCase() === wantedBrand)
        .first()
    },

    async add(item: NewPantryItem): Promise<number> {
      return db.pantryItems.add({ ...item, updatedAt: new Date().toISOString() })
    },

    async list(): Promise<PantryItem[]> {
      const items = await db.pantryItems.toArray()
      return items.sort(byNameThenBrand)
    },

    async search(query: string): Promise<PantryItem[]> {
      const needle = query.trim().toLowerCase()
      const items = await db.pantryItems
        .filter((item) =>
          [item.name, item.brand, item.category].some((field) => (field ?? '').toLowerCase().includes(needle)))
        .toArray()
      return items.sort(byNameThenBrand)
    },

    async update(id: number, changes: Partial<NewPantryItem>): Promise<void> {
      await db.pantryItems.update(id, { ...changes, updatedAt: new Date().toISOString() })
    },

    async updateAmounts(id: number, amounts: { amount: number; baseAmount: number | null }): Promise<void> {
      const updated = await db.pantryItems.update(id, { ...amounts, updatedAt: new Date().toISOString() })
      if (updated === 0) throw new Error(`Pantry item ${id} not found`)
    },

    async remove(id: number): Promise<void> {
      await db.pantryItems.delete(id)
    },
  }
}
