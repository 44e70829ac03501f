import type { MealPlanEntry } from '@domain/models/MealPlanEntry.ts'
import type { PantryItem } from '@domain/models/PantryItem.ts'
import type { RecipeIngredient } from '@domain/models/Recipe.ts'
import { OPEN_STATUS, type ShoppingCandidate } from '@domain/models/ShoppingListEntry.ts'
import { emptySyncReport, type SyncReport } from '@domain/models/SyncReport.ts'
import { mergeOrInsert } from '@application/shopping/mergeOrInsert.ts'
import { formatDate, isIsoDate } from '@application/mealplan/dates.ts'
import type { ConsumptionContext } from './context.ts'
import { resolveQuantity } from './resolveQuantity.ts'
import {
  clampNonNegative,
  effectiveThreshold,
  nextBaseline,
  replenishmentNote,
} from './threshold.ts'

function replenishmentCandidate(item: PantryItem, remaining: number, cutoff: number): ShoppingCandidate {
  return {
    name: item.name || 'Item',
    brand: item.brand ?? '',
    quantity: 1,
    unit: item.unit ?? '',
    category: item.category ?? '',
    notes: replenishmentNote(item, remaining, cutoff),
    store: item.store ?? '',
    status: OPEN_STATUS,
    linkedPantryId: item.id,
  }
}

async function consumeIngredient(
  context: ConsumptionContext,
  entry: MealPlanEntry,
  ingredient: RecipeIngredient,
  report: SyncReport,
): Promise<void> {
  if (ingredient.linkedPantryId === null) {
    report.skippedIngredients++
    return
  }

  const item = await context.pantry.getById(ingredient.linkedPantryId)
  if (!item) {
    context.logger.warn(`[Larder] Ingredient "${ingredient.name}" links to missing pantry item ${ingredient.linkedPantryId}`)
    report.skippedIngredients++
    return
  }

  const baseAmount = nextBaseline(item.amount, item.baseAmount)
  const required = (ingredient.quantity ?? 0) * (entry.servings ?? 1)
  const converted = resolveQuantity(required, ingredient.unit, item.unit, context.unitPolicy)

  if (converted === null) {
    context.logger.warn(
      `[Larder] Cannot deduct "${ingredient.name}": ${ingredient.unit ?? '(none)'} does not convert to ${item.unit ?? '(none)'}`,
    )
    report.skippedIngredients++
    // The baseline is still kept current for this item.
    if (baseAmount !== item.baseAmount) {
      await context.pantry.updateAmounts(item.id, { amount: item.amount, baseAmount })
    }
    return
  }

  const remaining = clampNonNegative(item.amount - converted)
  await context.pantry.updateAmounts(item.id, { amount: remaining, baseAmount })
  report.updatedItems++

  const cutoff = effectiveThreshold(item.threshold, baseAmount)
  if (cutoff !== null && remaining <= cutoff) {
    await mergeOrInsert(context.shopping, replenishmentCandidate(item, remaining, cutoff))
    report.autoAdded++
  }
}

/**
 * Deduct the ingredients of every pending meal-plan entry dated on or before
 * `asOfDate` from the pantry, and queue low items on the shopping list.
 *
 * Each entry is applied in its own transaction together with its
 * `usageApplied` flag, so a second run over the same dates does nothing.
 * Ingredient-level problems are counted in the report; a store failure rolls
 * back the current entry and is rethrown.
 */
export async function syncMenuConsumption(
  context: ConsumptionContext,
  asOfDate: string = formatDate(new Date()),
): Promise<SyncReport> {
  if (!isIsoDate(asOfDate)) throw new Error(`Invalid sync date "${asOfDate}", expected YYYY-MM-DD`)

  const report = emptySyncReport()
  const entries = await context.mealPlan.getPendingEntries(asOfDate)
  if (entries.length === 0) return report

  for (const entry of entries) {
    const entryReport = emptySyncReport()

    try {
      await context.transaction(async () => {
        const ingredients = await context.recipes.getIngredients(entry.recipeId)
        for (const ingredient of ingredients) {
          await consumeIngredient(context, entry, ingredient, entryReport)
        }
        await context.mealPlan.markUsageApplied(entry.id)
      })
    } catch (error) {
      throw new Error(`Failed to apply meal plan entry ${entry.id} (${entry.date})`, { cause: error })
    }

    report.processedEntries++
    report.updatedItems += entryReport.updatedItems
    report.skippedIngredients += entryReport.skippedIngredients
    report.autoAdded += entryReport.autoAdded
  }

  context.logger.info(
    `[Larder] Synced ${report.processedEntries} meal plan entries up to ${asOfDate}: ` +
      `${report.updatedItems} pantry updates, ${report.skippedIngredients} skipped, ${report.autoAdded} auto-added`,
  )
  return report
}
