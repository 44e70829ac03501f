import { describe, it, expect } from 'vitest'
import { parseQuantityUnit } from '@application/units/parseQuantityUnit.ts'

describe('parseQuantityUnit', () => {
  it('splits a value from its unit', () => {
    expect(parseQuantityUnit('2 Cups')).toEqual({ value: 2, unit: 'cups' })
    expect(parseQuantityUnit('  1.5   fl oz ')).toEqual({ value: 1.5, unit: 'fl oz' })
  })

  it('accepts a bare number', () => {
    expect(parseQuantityUnit('500')).toEqual({ value: 500, unit: '' })
  })

  it('returns null for empty or non-numeric text', () => {
    expect(parseQuantityUnit('')).toBeNull()
    expect(parseQuantityUnit('   ')).toBeNull()
    expect(parseQuantityUnit('some salt')).toBeNull()
  })
})
