import type { MealPlanEntry } from '@domain/models/MealPlanEntry.ts'
import type { MealPlanStore } from '@application/ports/stores.ts'
import { isIsoDate } from '@application/mealplan/dates.ts'
import type { LarderDB } from './database.ts'

export interface MealPlanRepository extends MealPlanStore {
  getById(id: number): Promise<MealPlanEntry | undefined>
  addMeal(date: string, recipeId: number, servings?: number | null): Promise<number>
  removeMeal(id: number): Promise<void>
}

export function createMealPlanRepository(db: LarderDB): MealPlanRepository {
  return {
    async getById(id: number): Promise<MealPlanEntry | undefined> {
      return db.mealPlanEntries.get(id)
    },

    async getPendingEntries(asOfDate: string): Promise<MealPlanEntry[]> {
      const entries = await db.mealPlanEntries
        .where('date')
        .belowOrEqual(asOfDate)
        .filter((entry) => !entry.usageApplied)
        .toArray()
      return entries.sort((a, b) => a.date.localeCompare(b.date) || a.id - b.id)
    },

    async addMeal(date: string, recipeId: number, servings: number | null = null): Promise<number> {
      if (!isIsoDate(date)) throw new Error(`Invalid meal date "${date}", expected YYYY-MM-DD`)
      return db.mealPlanEntries.add({ date, recipeId, servings, usageApplied: false })
    },

    async markUsageApplied(id: number): Promise<void> {
      const updated = await db.mealPlanEntries.update(id, { usageApplied: true })
      if (updated === 0) throw new Error(`Meal plan entry ${id} not found`)
    },

    async removeMeal(id: number): Promise<void> {
      await db.mealPlanEntries.delete(id)
    },
  }
}
