import type { User } from '../db/schema/users.js'

/** True only for the moderator role. Admins are not moderators by this check. */
export function isModerator(user: Pick<User, 'role'>): boolean {
  return user.role === 'moderator'
}

/** True for the admin role, or for any superuser regardless of role. */
export function isAdmin(user: Pick<User, 'role' | 'isSuperuser'>): boolean {
  return user.role === 'admin' || user.isSuperuser
}
