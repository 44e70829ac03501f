import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import type { ShoppingCandidate } from '@domain/models/ShoppingListEntry.ts'
import { mergeOrInsert } from '@application/shopping/mergeOrInsert.ts'
import type { Larder } from '@infrastructure/createLarder.ts'
import { addShoppingEntry, createTestLarder } from '../../helpers/testLarder.ts'

function makeCandidate(overrides: Partial<ShoppingCandidate> = {}): ShoppingCandidate {
  return {
    name: 'Rice',
    brand: 'Acme',
    quantity: 1,
    unit: 'kg',
    category: 'Grains',
    notes: 'Auto-added',
    store: 'Corner shop',
    status: 'pending',
    linkedPantryId: 7,
    ...overrides,
  }
}

let larder: Larder

beforeEach(() => {
  larder = createTestLarder()
})

afterEach(() => {
  larder.db.close()
})

describe('mergeOrInsert', () => {
  it('inserts a new entry when nothing matches', async () => {
    const outcome = await mergeOrInsert(larder.shopping, makeCandidate())

    expect(outcome).toBe('inserted')
    const entries = await larder.shopping.list()
    expect(entries).toHaveLength(1)
    expect(entries[0]).toMatchObject({
      name: 'Rice',
      brand: 'Acme',
      quantity: 1,
      unit: 'kg',
      category: 'Grains',
      notes: 'Auto-added',
      store: 'Corner shop',
      status: 'pending',
      linkedPantryId: 7,
    })
  })

  it('sums repeated candidates for the same pantry item into one open entry', async () => {
    await mergeOrInsert(larder.shopping, makeCandidate())
    const outcome = await mergeOrInsert(larder.shopping, makeCandidate({ notes: 'second' }))

    expect(outcome).toBe('incremented')
    const entries = await larder.shopping.list()
    expect(entries).toHaveLength(1)
    expect(entries[0].quantity).toBe(2)
    expect(entries[0].notes).toBe('Auto-added')
  })

  it('matches on the pantry link even when the name differs', async () => {
    const id = await addShoppingEntry(larder, { name: 'Basmati', unit: 'kg', quantity: 3, linkedPantryId: 7 })

    await mergeOrInsert(larder.shopping, makeCandidate())

    expect(await larder.shopping.getById(id)).toMatchObject({ name: 'Basmati', quantity: 4 })
    expect(await larder.shopping.list()).toHaveLength(1)
  })

  it('never reopens a purchased entry', async () => {
    await addShoppingEntry(larder, { name: 'Rice', unit: 'kg', status: 'purchased', linkedPantryId: 7 })

    const outcome = await mergeOrInsert(larder.shopping, makeCandidate())

    expect(outcome).toBe('inserted')
    const open = await larder.shopping.listOpen()
    expect(open).toHaveLength(1)
    expect(open[0].status).toBe('pending')
  })

  it('treats an entry with an empty status as open', async () => {
    const id = await addShoppingEntry(larder, { name: 'Rice', unit: 'kg', status: null, linkedPantryId: 7 })

    await mergeOrInsert(larder.shopping, makeCandidate())

    expect((await larder.shopping.getById(id))?.quantity).toBe(2)
  })

  it('matches unlinked candidates on name and unit', async () => {
    const id = await addShoppingEntry(larder, { name: 'Rice', unit: 'kg', quantity: 2 })

    await mergeOrInsert(larder.shopping, makeCandidate({ linkedPantryId: null }))

    expect((await larder.shopping.getById(id))?.quantity).toBe(3)
    expect(await larder.shopping.list()).toHaveLength(1)
  })

  it('keeps entries with a different unit apart', async () => {
    await addShoppingEntry(larder, { name: 'Rice', unit: 'lb', quantity: 2 })

    const outcome = await mergeOrInsert(larder.shopping, makeCandidate({ linkedPantryId: null }))

    expect(outcome).toBe('inserted')
    expect(await larder.shopping.list()).toHaveLength(2)
  })

  it('adds to a quantity stored as numeric text', async () => {
    const id = await addShoppingEntry(larder, { name: 'Rice', unit: 'kg', quantity: '2', linkedPantryId: 7 })

    await mergeOrInsert(larder.shopping, makeCandidate())

    expect((await larder.shopping.getById(id))?.quantity).toBe(3)
  })

  it('leaves a non-numeric quantity alone and does not insert a duplicate', async () => {
    const id = await addShoppingEntry(larder, { name: 'Rice', unit: 'kg', quantity: 'a few', linkedPantryId: 7 })

    const outcome = await mergeOrInsert(larder.shopping, makeCandidate())

    expect(outcome).toBe('matched')
    expect((await larder.shopping.getById(id))?.quantity).toBe('a few')
    expect(await larder.shopping.list()).toHaveLength(1)
  })
})

describe('mergeOrInsert with a reduced shopping schema', () => {
  it('drops unsupported fields and matches on name alone', async () => {
    const reduced = createTestLarder({ shoppingFields: ['quantity'] })

    await mergeOrInsert(reduced.shopping, makeCandidate())
    const outcome = await mergeOrInsert(reduced.shopping, makeCandidate({ unit: 'g' }))

    expect(outcome).toBe('incremented')
    const entries = await reduced.shopping.list()
    expect(entries).toHaveLength(1)
    expect(entries[0]).toMatchObject({
      name: 'Rice',
      quantity: 2,
      brand: null,
      unit: null,
      notes: null,
      status: null,
      linkedPantryId: null,
    })
    reduced.db.close()
  })

  it('counts a match as satisfied when the schema has no quantity', async () => {
    const reduced = createTestLarder({ shoppingFields: ['unit', 'status'] })

    await mergeOrInsert(reduced.shopping, makeCandidate())
    const outcome = await mergeOrInsert(reduced.shopping, makeCandidate())

    expect(outcome).toBe('matched')
    const entries = await reduced.shopping.list()
    expect(entries).toHaveLength(1)
    expect(entries[0]).toMatchObject({ name: 'Rice', unit: 'kg', status: 'pending', quantity: null })
    reduced.db.close()
  })
})
