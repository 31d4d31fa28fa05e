import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest'
import { createTestDb, createMockLogger } from '../../helpers/test-db.js'
import type { TestDb } from '../../helpers/test-db.js'
import { createServices } from '../../../src/services/index.js'
import type { Services } from '../../../src/services/index.js'
import { escapeLike } from '../../../src/services/titles.js'
import { NotFoundError, ValidationError } from '../../../src/lib/api-errors.js'

describe('TitleService', () => {
  let testDb: TestDb
  let services: Services
  const nextYear = new Date().getFullYear() + 1

  beforeAll(async () => {
    testDb = await createTestDb()
    services = createServices(testDb.db, createMockLogger())
  })

  afterAll(async () => {
    await testDb.close()
  })

  beforeEach(async () => {
    await testDb.reset()
  })

  describe('createTitle()', () => {
    it('creates a title without category or genres', async () => {
      const title = await services.titles.createTitle({ name: 'Dune', year: 1965, description: 'A test title.' })

      expect(title).toStrictEqual({
        id: 1,
        name: 'Dune',
        year: 1965,
        description: 'A test title.',
        categoryId: null,
        category: null,
        genres: [],
        rating: null,
      })
    })

    it('links category and deduplicated genres', async () => {
      const books = await services.categories.createCategory({ name: 'Books', slug: 'books' })
      const scifi = await services.genres.createGenre({ name: 'Science fiction', slug: 'sci-fi' })
      const adventure = await services.genres.createGenre({ name: 'Adventure', slug: 'adventure' })

      const title = await services.titles.createTitle({
        name: 'Dune',
        year: 1965,
        description: 'Desert planet.',
        categoryId: books.id,
        genreIds: [scifi.id, adventure.id, scifi.id],
      })

      expect(title.category).toStrictEqual(books)
      // ordered by genre name
      expect(title.genres).toStrictEqual([adventure, scifi])
    })

    it('rejects a year after the current one', async () => {
      const attempt = services.titles.createTitle({ name: 'Sequel', year: nextYear, description: 'A test title.' })
      await expect(attempt).rejects.toBeInstanceOf(ValidationError)
      await expect(attempt).rejects.toThrow(`year: Year ${String(nextYear)} is in the future`)
    })

    it('rejects a year outside the column range before it reaches storage', async () => {
      const logger = createMockLogger()
      const titles = createServices(testDb.db, logger).titles

      const attempt = titles.createTitle({ name: 'Ancient', year: -3_000_000_000, description: 'Very old.' })

      await expect(attempt).rejects.toBeInstanceOf(ValidationError)
      await expect(attempt).rejects.toThrow('year: Year must be 1 or later')
      expect(logger.error).not.toHaveBeenCalled()
      await expect(titles.listTitles()).resolves.toStrictEqual([])
    })

    it('accepts the current year', async () => {
      const year = nextYear - 1
      await expect(services.titles.createTitle({ name: 'New', year, description: 'A test title.' })).resolves.toMatchObject({ year })
    })

    it('rejects an unknown category and writes nothing', async () => {
      await expect(
        services.titles.createTitle({ name: 'Dune', year: 1965, description: 'A test title.', categoryId: 99 })
      ).rejects.toThrow('Category not found')
      await expect(services.titles.listTitles()).resolves.toStrictEqual([])
    })

    it('rolls back the title when a genre is unknown', async () => {
      const attempt = services.titles.createTitle({ name: 'Dune', year: 1965, description: 'A test title.', genreIds: [99] })
      await expect(attempt).rejects.toBeInstanceOf(NotFoundError)
      await expect(attempt).rejects.toThrow('Genre not found')
      await expect(services.titles.listTitles()).resolves.toStrictEqual([])
    })
  })

  describe('getTitle()', () => {
    it('reports the rounded average score', async () => {
      const ann = await services.users.createUser({ username: 'ann', email: 'ann@x.com' })
      const bob = await services.users.createUser({ username: 'bob', email: 'bob@x.com' })
      const dune = await services.titles.createTitle({ name: 'Dune', year: 1965, description: 'A test title.' })
      await services.reviews.createReview({ authorId: ann.id, titleId: dune.id, text: 'Great.', score: 9 })
      await services.reviews.createReview({ authorId: bob.id, titleId: dune.id, text: 'Fine.', score: 6 })

      const title = await services.titles.getTitle(dune.id)

      expect(title.rating).toBe(8)
    })

    it('throws NotFoundError for an unknown id', async () => {
      await expect(services.titles.getTitle(5)).rejects.toThrow('Title 5 not found')
    })
  })

  describe('listTitles()', () => {
    beforeEach(async () => {
      const books = await services.categories.createCategory({ name: 'Books', slug: 'books' })
      const films = await services.categories.createCategory({ name: 'Films', slug: 'films' })
      const scifi = await services.genres.createGenre({ name: 'Science fiction', slug: 'sci-fi' })
      await services.titles.createTitle({ name: 'Dune', year: 1965, description: 'A test title.', categoryId: books.id, genreIds: [scifi.id] })
      await services.titles.createTitle({ name: 'Dune', year: 2021, description: 'A test title.', categoryId: films.id, genreIds: [scifi.id] })
      await services.titles.createTitle({ name: '100% Wolf', year: 2020, description: 'A test title.', categoryId: films.id })
    })

    it('lists every title by id without a filter', async () => {
      const all = await services.titles.listTitles()
      expect(all.map((t) => t.id)).toStrictEqual([1, 2, 3])
    })

    it('filters by category slug', async () => {
      const films = await services.titles.listTitles({ categorySlug: 'films' })
      expect(films.map((t) => t.id)).toStrictEqual([2, 3])
    })

    it('filters by genre slug and year', async () => {
      const found = await services.titles.listTitles({ genreSlug: 'sci-fi', year: 2021 })
      expect(found.map((t) => t.id)).toStrictEqual([2])
    })

    it('matches names case-insensitively and treats % literally', async () => {
      const dune = await services.titles.listTitles({ name: 'dUNE' })
      expect(dune.map((t) => t.id)).toStrictEqual([1, 2])

      const percent = await services.titles.listTitles({ name: '0%' })
      expect(percent.map((t) => t.name)).toStrictEqual(['100% Wolf'])

      const none = await services.titles.listTitles({ name: '%x' })
      expect(none).toStrictEqual([])
    })
  })

  describe('updateTitle()', () => {
    it('replaces the genre set and keeps other fields', async () => {
      const scifi = await services.genres.createGenre({ name: 'Science fiction', slug: 'sci-fi' })
      const drama = await services.genres.createGenre({ name: 'Drama', slug: 'drama' })
      const dune = await services.titles.createTitle({ name: 'Dune', year: 1965, description: 'A test title.', genreIds: [scifi.id] })

      const updated = await services.titles.updateTitle(dune.id, { genreIds: [drama.id] })

      expect(updated.genres).toStrictEqual([drama])
      expect(updated.name).toBe('Dune')
    })

    it('re-validates the year at write time', async () => {
      const dune = await services.titles.createTitle({ name: 'Dune', year: 1965, description: 'A test title.' })

      await expect(services.titles.updateTitle(dune.id, { year: nextYear })).rejects.toBeInstanceOf(
        ValidationError
      )
      await expect(services.titles.getTitle(dune.id)).resolves.toMatchObject({ year: 1965 })
    })

    it('throws NotFoundError for an unknown id', async () => {
      await expect(services.titles.updateTitle(3, { name: 'X' })).rejects.toBeInstanceOf(NotFoundError)
    })
  })

  describe('deleteTitle()', () => {
    it('removes reviews and, through them, their comments', async () => {
      const ann = await services.users.createUser({ username: 'ann', email: 'ann@x.com' })
      const bob = await services.users.createUser({ username: 'bob', email: 'bob@x.com' })
      const scifi = await services.genres.createGenre({ name: 'Science fiction', slug: 'sci-fi' })
      const dune = await services.titles.createTitle({ name: 'Dune', year: 1965, description: 'A test title.', genreIds: [scifi.id] })
      const other = await services.titles.createTitle({ name: 'Solaris', year: 1961, description: 'A test title.' })

      const r1 = await services.reviews.createReview({ authorId: ann.id, titleId: dune.id, text: 'Yes.', score: 9 })
      const r2 = await services.reviews.createReview({ authorId: bob.id, titleId: dune.id, text: 'No.', score: 3 })
      const keptReview = await services.reviews.createReview({
        authorId: ann.id,
        titleId: other.id,
        text: 'Odd.',
        score: 7,
      })
      await services.comments.createComment({ authorId: bob.id, reviewId: r1.id, text: 'Hm.' })
      await services.comments.createComment({ authorId: ann.id, reviewId: r2.id, text: 'Why?' })
      await services.comments.createComment({ authorId: bob.id, reviewId: r2.id, text: 'Because.' })
      const keptComment = await services.comments.createComment({
        authorId: bob.id,
        reviewId: keptReview.id,
        text: 'Agreed.',
      })

      const result = await services.titles.deleteTitle(dune.id)

      expect(result).toStrictEqual({ reviews: 2, comments: 3 })
      await expect(services.titles.getTitle(dune.id)).rejects.toBeInstanceOf(NotFoundError)
      await expect(services.reviews.getReview(r1.id)).rejects.toBeInstanceOf(NotFoundError)
      await expect(services.comments.listComments(keptReview.id)).resolves.toStrictEqual([keptComment])
      await expect(services.genres.getGenre('sci-fi')).resolves.toStrictEqual(scifi)
    })
  })
})

describe('escapeLike', () => {
  it('escapes wildcards and backslashes', () => {
    expect(escapeLike('50%_off\\')).toBe('50\\%\\_off\\\\')
  })
})
