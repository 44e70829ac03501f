export interface PantryItem {
  id: number
  name: string
  brand: string | null
  category: string | null
  store: string | null
  unit: string | null        // native unit, amounts are stored in it
  amount: number             // remaining quantity
  baseAmount: number | null  // highest amount on record (100% for ratio thresholds)
  threshold: number | null   // (0,1] ratio of baseAmount, >1 absolute, <=0/null disabled
  notes: string | null
  updatedAt: string
}

export type NewPantryItem = Omit<PantryItem, 'id' | 'updatedAt'>
