import { describe, it, expect, beforeAll, afterAll } from 'vitest'
import { createTestDb, createMockLogger } from '../../helpers/test-db.js'
import type { TestDb } from '../../helpers/test-db.js'
import { createServices } from '../../../src/services/index.js'
import { UniquenessError, ValidationError } from '../../../src/lib/api-errors.js'

describe('review lifecycle', () => {
  let testDb: TestDb

  beforeAll(async () => {
    testDb = await createTestDb()
  })

  afterAll(async () => {
    await testDb.close()
  })

  it('allows one review per author and title and refuses future titles', async () => {
    const logger = createMockLogger()
    const services = createServices(testDb.db, logger)

    const ann = await services.users.createUser({ username: 'ann', email: 'ann@x.com' })
    const dune = await services.titles.createTitle({ name: 'Dune', year: 1965, description: 'A test title.' })

    const review = await services.reviews.createReview({
      authorId: ann.id,
      titleId: dune.id,
      text: 'Spice must flow.',
      score: 9,
    })
    expect(review.score).toBe(9)

    await expect(
      services.reviews.createReview({ authorId: ann.id, titleId: dune.id, text: 'Changed my mind.', score: 5 })
    ).rejects.toBeInstanceOf(UniquenessError)
    expect(logger.warn).toHaveBeenCalledWith(
      {
        authorId: ann.id,
        titleId: dune.id,
        reason: 'This author has already reviewed this title',
      },
      'Rejected create review'
    )

    const nextYear = new Date().getFullYear() + 1
    await expect(
      services.titles.createTitle({ name: 'Dune: Part Three', year: nextYear, description: 'A test title.' })
    ).rejects.toBeInstanceOf(ValidationError)

    await expect(services.reviews.listReviews(dune.id)).resolves.toStrictEqual([review])
  })
})
