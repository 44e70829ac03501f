import type { PantryItem } from '@domain/models/PantryItem.ts'
import { PURCHASED_STATUS, isOpenStatus, type ShoppingListEntry } from '@domain/models/ShoppingListEntry.ts'
import type { ConsumptionContext } from '@application/consumption/context.ts'
import { resolveQuantity } from '@application/consumption/resolveQuantity.ts'
import { nextBaseline } from '@application/consumption/threshold.ts'

export interface PurchaseOptions {
  quantity?: number
  unit?: string | null     // defaults to the shopping entry's unit
}

type PurchaseContext = Pick<ConsumptionContext, 'pantry' | 'shopping' | 'transaction' | 'unitPolicy' | 'logger'>

async function resolvePantryItem(
  context: PurchaseContext,
  entry: ShoppingListEntry,
  unit: string | null,
): Promise<PantryItem> {
  if (entry.linkedPantryId !== null) {
    const linked = await context.pantry.getById(entry.linkedPantryId)
    if (linked) return linked
  }

  const byName = await context.pantry.findByNameBrand(entry.name, entry.brand)
  if (byName) return byName

  const id = await context.pantry.add({
    name: entry.name,
    brand: entry.brand,
    category: entry.category,
    store: entry.store,
    unit,
    amount: 0,
    baseAmount: null,
    threshold: null,
    notes: null,
  })
  const created = await context.pantry.getById(id)
  if (!created) throw new Error(`Pantry item ${id} missing after insert`)
  return created
}

/**
 * Move a bought shopping entry into the pantry: restock the matching pantry
 * item (creating it if needed) and close the entry. Returns the pantry item id.
 * An entry that is no longer open is rejected.
 */
export async function applyPurchase(
  context: PurchaseContext,
  shoppingEntryId: number,
  options: PurchaseOptions = {},
): Promise<number> {
  return context.transaction(async () => {
    const entry = await context.shopping.getById(shoppingEntryId)
    if (!entry) throw new Error(`Shopping entry ${shoppingEntryId} not found`)
    if (context.shopping.fields.has('status') && !isOpenStatus(entry.status)) {
      throw new Error(`Shopping entry ${shoppingEntryId} is already ${entry.status}`)
    }

    const quantity = options.quantity ?? 1
    const unit = options.unit !== undefined ? options.unit : entry.unit
    const item = await resolvePantryItem(context, entry, unit)

    const converted = resolveQuantity(quantity, unit, item.unit, context.unitPolicy)
    if (converted === null) {
      throw new Error(`Cannot restock "${item.name}": ${unit ?? '(none)'} does not convert to ${item.unit ?? '(none)'}`)
    }

    const amount = item.amount + converted
    await context.pantry.updateAmounts(item.id, { amount, baseAmount: nextBaseline(amount, item.baseAmount) })

    if (context.shopping.fields.has('status')) {
      await context.shopping.setStatus(entry.id, PURCHASED_STATUS)
    } else {
      await context.shopping.remove(entry.id)
    }

    context.logger.info(`[Larder] Restocked "${item.name}" by ${converted} ${item.unit ?? ''}`.trimEnd())
    return item.id
  })
}
