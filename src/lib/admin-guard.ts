import { NextResponse } from 'next/server'
import { db } from './db'
import { getSite, type Site } from './site'
import { getAdminSession } from './admin-session'
import { hasToChangePassword, isAccountDisabled, permissions } from './admin'
import type { AdminUser } from '@/types/models'

export interface RequireAdminOptions {
  /** Only sysadmins may proceed */
  sysadmin?: boolean
  /** Let users who must change their password through (the profile update itself) */
  allowPasswordChange?: boolean
}

/**
 * Moderation access check. Anonymous requests are sent to the login page,
 * users with an expired or forced password to their profile.
 */
export async function requireAdmin(
  options: RequireAdminOptions = {}
): Promise<
  | { authorized: true; user: AdminUser; site: Site }
  | { authorized: false; response: NextResponse }
> {
  const [session, site] = await Promise.all([getAdminSession(), getSite()])
  const loginUrl = `${site.url}/admin/login`

  if (!session) {
    return { authorized: false, response: NextResponse.redirect(loginUrl) }
  }

  const user = await db.adminUsers.findByEmail(session.email)
  if (!user || isAccountDisabled(user)) {
    return { authorized: false, response: NextResponse.redirect(loginUrl) }
  }

  if (!options.allowPasswordChange && hasToChangePassword(user)) {
    return {
      authorized: false,
      response: NextResponse.redirect(`${site.url}/admin/profile/${user.id}/edit`),
    }
  }

  if (!permissions.canModerate(user.role) || (options.sysadmin && !permissions.canManageSite(user.role))) {
    return { authorized: false, response: NextResponse.json({ error: 'Forbidden' }, { status: 403 }) }
  }

  return { authorized: true, user, site }
}
