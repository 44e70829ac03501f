import Dexie, { type DexieOptions, type EntityTable } from 'dexie'
import type { PantryItem } from '@domain/models/PantryItem.ts'
import type { Recipe, RecipeIngredient } from '@domain/models/Recipe.ts'
import type { MealPlanEntry } from '@domain/models/MealPlanEntry.ts'
import type { ShoppingListEntry } from '@domain/models/ShoppingListEntry.ts'

export class LarderDB extends Dexie {
  pantryItems!: EntityTable<PantryItem, 'id'>
  recipes!: EntityTable<Recipe, 'id'>
  recipeIngredients!: EntityTable<RecipeIngredient, 'id'>
  mealPlanEntries!: EntityTable<MealPlanEntry, 'id'>
  shoppingList!: EntityTable<ShoppingListEntry, 'id'>

  constructor(name: string, options?: DexieOptions) {
    super(name, options)

    this.version(1).stores({
      pantryItems: '++id, name, brand, category',
      recipes: '++id, name',
      recipeIngredients: '++id, recipeId, linkedPantryId',
      mealPlanEntries: '++id, date, recipeId',
      shoppingList: '++id, name, linkedPantryId, status, createdAt',
    })
  }
}
