export { LarderDB } from './database.ts'
export { createPantryRepository, type PantryRepository } from './pantryRepository.ts'
export { createRecipeRepository, type RecipeRepository } from './recipeRepository.ts'
export { createMealPlanRepository, type MealPlanRepository } from './mealPlanRepository.ts'
export { createShoppingRepository, type ShoppingRepository } from './shoppingRepository.ts'
