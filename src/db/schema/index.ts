export { users } from './users.js'
export { categories } from './categories.js'
export { genres } from './genres.js'
export { titles, titleGenres } from './titles.js'
export { reviews } from './reviews.js'
export { comments } from './comments.js'
