import type { Database } from '../db/index.js'
import type { Logger } from '../lib/logger.js'
import { createUserService } from './users.js'
import type { UserService } from './users.js'
import { createCategoryService } from './categories.js'
import type { CategoryService } from './categories.js'
import { createGenreService } from './genres.js'
import type { GenreService } from './genres.js'
import { createTitleService } from './titles.js'
import type { TitleService } from './titles.js'
import { createReviewService } from './reviews.js'
import type { ReviewService } from './reviews.js'
import { createCommentService } from './comments.js'
import type { CommentService } from './comments.js'

/** Every entity service, wired to one database and logger. */
export interface Services {
  users: UserService
  categories: CategoryService
  genres: GenreService
  titles: TitleService
  reviews: ReviewService
  comments: CommentService
}

export function createServices(db: Database, logger: Logger): Services {
  return {
    users: createUserService(db, logger.child({ service: 'users' })),
    categories: createCategoryService(db, logger.child({ service: 'categories' })),
    genres: createGenreService(db, logger.child({ service: 'genres' })),
    titles: createTitleService(db, logger.child({ service: 'titles' })),
    reviews: createReviewService(db, logger.child({ service: 'reviews' })),
    comments: createCommentService(db, logger.child({ service: 'comments' })),
  }
}
