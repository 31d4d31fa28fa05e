import { describe, it, expect } from 'vitest'
import { createTitleSchema, titleFilterSchema, updateTitleSchema } from '../../../src/validation/titles.js'

describe('createTitleSchema', () => {
  it('accepts a title without category or genres', () => {
    const result = createTitleSchema.safeParse({ name: 'Dune', year: 1965, description: 'Desert planet.' })
    expect(result.success).toBe(true)
  })

  it('requires a description', () => {
    const result = createTitleSchema.safeParse({ name: 'Dune', year: 1965 })
    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error.issues.map((i) => [i.path.join('.'), i.message])).toStrictEqual([
        ['description', 'Description is required'],
      ])
    }
  })

  it('rejects a blank description', () => {
    expect(createTitleSchema.safeParse({ name: 'Dune', year: 1965, description: '   ' }).success).toBe(false)
  })

  it('rejects a year below the floor', () => {
    const result = createTitleSchema.safeParse({ name: 'Dune', year: 0, description: 'Old.' })
    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe('Year must be 1 or later')
    }
  })

  it('counts the name in characters, not UTF-16 units', () => {
    const name = '🎬'.repeat(256)
    expect(createTitleSchema.safeParse({ name, year: 2000, description: 'Clips.' }).success).toBe(true)
  })

  it('rejects a future year', () => {
    const year = new Date().getFullYear() + 1
    const result = createTitleSchema.safeParse({ name: 'Dune', year, description: 'Desert planet.' })
    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error.issues[0]?.path).toStrictEqual(['year'])
    }
  })

  it('rejects names longer than 256 characters', () => {
    expect(createTitleSchema.safeParse({ name: 'x'.repeat(257), year: 2000, description: 'Long.' }).success).toBe(false)
  })

  it('rejects non-positive genre ids', () => {
    expect(createTitleSchema.safeParse({ name: 'Dune', year: 1965, description: 'Desert planet.', genreIds: [0] }).success).toBe(false)
  })
})

describe('updateTitleSchema', () => {
  it('re-validates the year when supplied', () => {
    const year = new Date().getFullYear() + 1
    expect(updateTitleSchema.safeParse({ year }).success).toBe(false)
  })

  it('does not accept a null description', () => {
    expect(updateTitleSchema.safeParse({ description: null }).success).toBe(false)
  })

  it('allows clearing the category', () => {
    const result = updateTitleSchema.safeParse({ categoryId: null })
    expect(result.success).toBe(true)
    if (result.success) {
      expect(result.data.categoryId).toBeNull()
    }
  })
})

describe('titleFilterSchema', () => {
  it('rejects a year outside the integer column range', () => {
    expect(titleFilterSchema.safeParse({ year: 3_000_000_000 }).success).toBe(false)
  })
})
