import { SHOPPING_FIELDS, type ShoppingField } from '@domain/models/ShoppingListEntry.ts'
import type { UnitPolicy } from '@application/consumption/context.ts'

export interface LarderConfig {
  dbName: string
  unitPolicy: UnitPolicy
  shoppingFields: ReadonlySet<ShoppingField>
}

const UNIT_POLICIES: readonly UnitPolicy[] = ['permissive', 'strict']

function isShoppingField(value: string): value is ShoppingField {
  return SHOPPING_FIELDS.some((field) => field === value)
}

function isUnitPolicy(value: string): value is UnitPolicy {
  return UNIT_POLICIES.some((policy) => policy === value)
}

function parseShoppingFields(raw: string | undefined): ReadonlySet<ShoppingField> {
  if (raw === undefined || !raw.trim()) return new Set(SHOPPING_FIELDS)

  const fields = new Set<ShoppingField>()
  for (const name of raw.split(',').map((s) => s.trim()).filter(Boolean)) {
    if (!isShoppingField(name)) {
      throw new Error(`LARDER_SHOPPING_FIELDS: unknown field "${name}" (expected any of ${SHOPPING_FIELDS.join(', ')})`)
    }
    fields.add(name)
  }
  return fields
}

/**
 * Read deployment settings from the environment.
 *
 * - LARDER_DB_NAME: IndexedDB database name (default "LarderDB")
 * - LARDER_UNIT_POLICY: "permissive" (default) or "strict"
 * - LARDER_SHOPPING_FIELDS: comma-separated optional shopping-list fields this
 *   deployment stores (default: all of them)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): LarderConfig {
  const unitPolicy = env.LARDER_UNIT_POLICY?.trim() || 'permissive'
  if (!isUnitPolicy(unitPolicy)) {
    throw new Error(`LARDER_UNIT_POLICY must be "permissive" or "strict", got "${unitPolicy}"`)
  }

  return {
    dbName: env.LARDER_DB_NAME?.trim() || 'LarderDB',
    unitPolicy,
    shoppingFields: parseShoppingFields(env.LARDER_SHOPPING_FIELDS),
  }
}
