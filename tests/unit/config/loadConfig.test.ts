import { describe, it, expect } from 'vitest'
import { SHOPPING_FIELDS } from '@domain/models/ShoppingListEntry.ts'
import { loadConfig } from '@infrastructure/config/loadConfig.ts'

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    const config = loadConfig({})

    expect(config.dbName).toBe('LarderDB')
    expect(config.unitPolicy).toBe('permissive')
    expect([...config.shoppingFields]).toEqual([...SHOPPING_FIELDS])
  })

  it('reads every setting', () => {
    const config = loadConfig({
      LARDER_DB_NAME: 'kitchen',
      LARDER_UNIT_POLICY: 'strict',
      LARDER_SHOPPING_FIELDS: 'quantity, unit,status',
    })

    expect(config.dbName).toBe('kitchen')
    expect(config.unitPolicy).toBe('strict')
    expect([...config.shoppingFields]).toEqual(['quantity', 'unit', 'status'])
  })

  it('rejects an unknown unit policy', () => {
    expect(() => loadConfig({ LARDER_UNIT_POLICY: 'lenient' })).toThrow(
      'LARDER_UNIT_POLICY must be "permissive" or "strict", got "lenient"',
    )
  })

  it('rejects an unknown shopping field', () => {
    expect(() => loadConfig({ LARDER_SHOPPING_FIELDS: 'quantity,price' })).toThrow(
      'LARDER_SHOPPING_FIELDS: unknown field "price"',
    )
  })
})
