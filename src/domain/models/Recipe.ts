export interface Recipe {
  id: number
  name: string
  servings: number | null
}

export interface RecipeIngredient {
  id: number
  recipeId: number
  name: string
  quantity: number | null    // per single serving
  unit: string | null
  linkedPantryId: number | null
}
