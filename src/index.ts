export type { PantryItem, NewPantryItem } from '@domain/models/PantryItem.ts'
export type { Recipe, RecipeIngredient } from '@domain/models/Recipe.ts'
export type { MealPlanEntry } from '@domain/models/MealPlanEntry.ts'
export type { ShoppingListEntry, ShoppingCandidate, ShoppingField } from '@domain/models/ShoppingListEntry.ts'
export { SHOPPING_FIELDS, OPEN_STATUS, PURCHASED_STATUS, isOpenStatus } from '@domain/models/ShoppingListEntry.ts'
export type { SyncReport } from '@domain/models/SyncReport.ts'
export type { UnitFamily, UnitPhase } from '@domain/constants/units.ts'

export {
  classifyUnit,
  convert,
  fromCanonical,
  isConvertible,
  normalizeUnit,
  toCanonical,
  unitPhase,
  type CanonicalQuantity,
} from '@application/units/convertUnit.ts'
export { parseQuantityUnit, type ParsedQuantity } from '@application/units/parseQuantityUnit.ts'

export type * from '@application/ports/stores.ts'
export type { ConsumptionContext, UnitPolicy } from '@application/consumption/context.ts'
export { syncMenuConsumption } from '@application/consumption/syncMenuConsumption.ts'
export { resolveQuantity } from '@application/consumption/resolveQuantity.ts'
export { effectiveThreshold, nextBaseline } from '@application/consumption/threshold.ts'
export { mergeOrInsert, type MergeOutcome } from '@application/shopping/mergeOrInsert.ts'
export { projectCandidate } from '@application/shopping/shoppingSchema.ts'
export { applyPurchase, type PurchaseOptions } from '@application/pantry/applyPurchase.ts'
export { isLowStock, listLowStockItems } from '@application/pantry/lowStock.ts'

export { loadConfig, type LarderConfig } from '@infrastructure/config/loadConfig.ts'
export { createLarder, type Larder, type CreateLarderOptions } from '@infrastructure/createLarder.ts'
export * from '@infrastructure/db/index.ts'
