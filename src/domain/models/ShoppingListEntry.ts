export const OPEN_STATUS = 'pending'
export const PURCHASED_STATUS = 'purchased'

export interface ShoppingListEntry {
  id: number
  name: string
  brand: string | null
  quantity: number | string | null  // older rows may hold free text
  unit: string | null
  category: string | null
  notes: string | null
  store: string | null
  status: string | null
  linkedPantryId: number | null
  createdAt: string
}

/** Fields a shopping-list schema may or may not carry. `name` is always present. */
export type ShoppingField = Exclude<keyof ShoppingListEntry, 'id' | 'name' | 'createdAt'>

export const SHOPPING_FIELDS: readonly ShoppingField[] = [
  'brand',
  'quantity',
  'unit',
  'category',
  'notes',
  'store',
  'status',
  'linkedPantryId',
]

/** A prospective entry, before it is matched against the list. */
export type ShoppingCandidate = Omit<ShoppingListEntry, 'id' | 'createdAt' | 'quantity'> & {
  quantity: number
}

/** An entry is open until it is purchased or otherwise closed. */
export function isOpenStatus(status: string | null | undefined): boolean {
  return !status || status === OPEN_STATUS
}
