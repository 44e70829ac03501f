import type { Recipe, RecipeIngredient } from '@domain/models/Recipe.ts'
import type { RecipeStore } from '@application/ports/stores.ts'
import type { LarderDB } from './database.ts'

export interface RecipeRepository extends RecipeStore {
  getById(id: number): Promise<Recipe | undefined>
  add(recipe: Omit<Recipe, 'id'>, ingredients: Omit<RecipeIngredient, 'id' | 'recipeId'>[]): Promise<number>
  linkIngredient(ingredientId: number, pantryId: number | null): Promise<void>
  remove(id: number): Promise<void>
}

export function createRecipeRepository(db: LarderDB): RecipeRepository {
  return {
    async getById(id: number): Promise<Recipe | undefined> {
      return db.recipes.get(id)
    },

    async getIngredients(recipeId: number): Promise<RecipeIngredient[]> {
      return db.recipeIngredients.where('recipeId').equals(recipeId).toArray()
    },

    /** Save a recipe together with its ingredient list. Returns the recipe id. */
    async add(
      recipe: Omit<Recipe, 'id'>,
      ingredients: Omit<RecipeIngredient, 'id' | 'recipeId'>[],
    ): Promise<number> {
      return db.transaction('rw', [db.recipes, db.recipeIngredients], async () => {
        const recipeId = await db.recipes.add(recipe)
        await db.recipeIngredients.bulkAdd(ingredients.map((ingredient) => ({ ...ingredient, recipeId })))
        return recipeId
      })
    },

    async linkIngredient(ingredientId: number, pantryId: number | null): Promise<void> {
      await db.recipeIngredients.update(ingredientId, { linkedPantryId: pantryId })
    },

    async remove(id: number): Promise<void> {
      await db.transaction('rw', [db.recipes, db.recipeIngredients], async () => {
        await db.recipeIngredients.where('recipeId').equals(id).delete()
        await db.recipes.delete(id)
      })
    },
  }
}
