import type { DexieOptions } from 'dexie'
import type { ConsumptionContext } from '@application/consumption/context.ts'
import type { Logger } from '@application/ports/stores.ts'
import type { LarderConfig } from './config/loadConfig.ts'
import { LarderDB } from './db/database.ts'
import { createPantryRepository, type PantryRepository } from './db/pantryRepository.ts'
import { createRecipeRepository, type RecipeRepository } from './db/recipeRepository.ts'
import { createMealPlanRepository, type MealPlanRepository } from './db/mealPlanRepository.ts'
import { createShoppingRepository, type ShoppingRepository } from './db/shoppingRepository.ts'

export interface Larder extends ConsumptionContext {
  db: LarderDB
  pantry: PantryRepository
  recipes: RecipeRepository
  mealPlan: MealPlanRepository
  shopping: ShoppingRepository
}

export interface CreateLarderOptions {
  /** Dexie options; Node hosts pass their IndexedDB implementation here. */
  dexie?: DexieOptions
  logger?: Logger
}

/**
 * Open the database and wire the repositories into a consumption context.
 * The caller owns the result and closes `db` when done.
 */
export function createLarder(config: LarderConfig, options: CreateLarderOptions = {}): Larder {
  const db = new LarderDB(config.dbName, options.dexie)

  return {
    db,
    pantry: createPantryRepository(db),
    recipes: createRecipeRepository(db),
    mealPlan: createMealPlanRepository(db),
    shopping: createShoppingRepository(db, config.shoppingFields),
    transaction: (work) =>
      db.transaction('rw', [db.pantryItems, db.recipeIngredients, db.mealPlanEntries, db.shoppingList], work),
    unitPolicy: config.unitPolicy,
    logger: options.logger ?? console,
  }
}
