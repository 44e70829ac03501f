export interface MealPlanEntry {
  id: number
  date: string               // YYYY-MM-DD
  recipeId: number
  servings: number | null    // null counts as one serving
  usageApplied: boolean      // set once the entry's pantry usage has been deducted
}
