import type { PantryItem, NewPantryItem } from '@domain/models/PantryItem.ts'
import type { RecipeIngredient } from '@domain/models/Recipe.ts'
import type { MealPlanEntry } from '@domain/models/MealPlanEntry.ts'
import type { ShoppingField, ShoppingListEntry } from '@domain/models/ShoppingListEntry.ts'

export interface PantryStore {
  getById(id: number): Promise<PantryItem | undefined>
  findByNameBrand(name: string, brand: string | null): Promise<PantryItem | undefined>
  add(item: NewPantryItem): Promise<number>
  updateAmounts(id: number, amounts: { amount: number; baseAmount: number | null }): Promise<void>
}

export interface RecipeStore {
  getIngredients(recipeId: number): Promise<RecipeIngredient[]>
}

export interface MealPlanStore {
  /** Entries with `date <= asOfDate` not yet applied, ordered by (date, id). */
  getPendingEntries(asOfDate: string): Promise<MealPlanEntry[]>
  markUsageApplied(id: number): Promise<void>
}

/** What an insert may carry: `name` plus whichever optional fields the schema supports. */
export type ShoppingInsert = Pick<ShoppingListEntry, 'name'> & Partial<Pick<ShoppingListEntry, ShoppingField>>

export interface ShoppingListStore {
  /** Optional fields this deployment's shopping list actually stores. */
  readonly fields: ReadonlySet<ShoppingField>
  getById(id: number): Promise<ShoppingListEntry | undefined>
  findOpenByPantryId(pantryId: number): Promise<ShoppingListEntry | undefined>
  findOpenByNameUnit(name: string, unit: string | null): Promise<ShoppingListEntry | undefined>
  insert(entry: ShoppingInsert): Promise<number>
  setQuantity(id: number, quantity: number): Promise<void>
  setStatus(id: number, status: string): Promise<void>
  remove(id: number): Promise<void>
}

/** Runs `work` as one atomic unit against every store. */
export type TransactionRunner = <T>(work: () => Promise<T>) => Promise<T>

export interface Logger {
  info(message: string, ...details: unknown[]): void
  warn(message: string, ...details: unknown[]): void
}
