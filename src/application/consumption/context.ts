import type {
  Logger,
  MealPlanStore,
  PantryStore,
  RecipeStore,
  ShoppingListStore,
  TransactionRunner,
} from '@application/ports/stores.ts'

/**
 * How ingredients whose unit cannot be converted to the pantry unit are treated.
 * - permissive: skip only when both units are known and belong to different
 *   families; an unknown unit is taken as already being in the pantry unit.
 * - strict: skip whenever the units are not convertible.
 * Textually identical units are never skipped.
 */
export type UnitPolicy = 'permissive' | 'strict'

export interface ConsumptionContext {
  pantry: PantryStore
  recipes: RecipeStore
  mealPlan: MealPlanStore
  shopping: ShoppingListStore
  transaction: TransactionRunner
  unitPolicy: UnitPolicy
  logger: Logger
}
