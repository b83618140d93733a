/**
 * Moderation user roles, password policy and credential checks
 */

import bcrypt from 'bcryptjs'
import { db } from './db'
import { addMonths } from './format'
import { Validator } from './validation'
import { ValidationFailed } from './errors'
import type { AdminRole, AdminUser } from '@/types/models'

export const MAX_FAILED_LOGINS = 5
export const PASSWORD_MAX_AGE_MONTHS = 9
const BCRYPT_COST = 12

const PASSWORD_PATTERN = /^(?=.*[a-z])(?=.*[A-Z])(?=.*\d)(?=.*[\W_]).*$/

export const permissions = {
  canModerate: (role: AdminRole) => role === 'sysadmin' || role === 'moderator',
  canManageSite: (role: AdminRole) => role === 'sysadmin',
}

export function isAccountDisabled(user: AdminUser): boolean {
  return user.failedLoginCount >= MAX_FAILED_LOGINS
}

/**
 * Forced resets and passwords older than nine months must be changed
 * before anything else in moderation is reachable.
 */
export function hasToChangePassword(user: AdminUser, now = new Date()): boolean {
  if (user.forcePasswordReset) return true
  if (!user.passwordChangedAt) return false
  return user.passwordChangedAt.getTime() < addMonths(now, -PASSWORD_MAX_AGE_MONTHS).getTime()
}

export function hashPassword(password: string): Promise<string> {
  return bcrypt.hash(password, BCRYPT_COST)
}

/**
 * Check credentials, counting failures towards the lockout.
 * Returns the user on success, null otherwise.
 */
export async function authenticateAdmin(email: string, password: string, now = new Date()): Promise<AdminUser | null> {
  const user = await db.adminUsers.findByEmail(email.trim())
  if (!user) return null

  if (isAccountDisabled(user)) {
    console.warn(`[admin] Login attempt for disabled account ${user.id}`)
    return null
  }

  const valid = await bcrypt.compare(password, user.passwordDigest)
  if (!valid) {
    await db.adminUsers.update(user.id, { failedLoginCount: user.failedLoginCount + 1 })
    return null
  }

  return db.adminUsers.update(user.id, { failedLoginCount: 0, lastLoginAt: now })
}

export interface PasswordChange {
  currentPassword?: string
  password?: string
  passwordConfirmation?: string
}

export async function changePassword(user: AdminUser, change: PasswordChange, now = new Date()): Promise<AdminUser> {
  const v = new Validator()

  const currentValid = change.currentPassword
    ? await bcrypt.compare(change.currentPassword, user.passwordDigest)
    : false
  if (!currentValid) v.add('currentPassword', 'is incorrect')

  const password = change.password ?? ''
  if (v.presence('password', password)) {
    if (password.length < 8) v.add('password', 'is too short (minimum is 8 characters)')
    if (!PASSWORD_PATTERN.test(password)) {
      v.add('password', 'must contain at least one digit, a lower and upper case letter and a special character')
    }
    if (currentValid && change.currentPassword === password) {
      v.add('password', 'is the same as the current password')
    }
  }
  if (change.passwordConfirmation !== password) {
    v.add('passwordConfirmation', "doesn't match Password")
  }

  if (!v.valid) throw new ValidationFailed(v.errors)

  return db.adminUsers.update(user.id, {
    passwordDigest: await hashPassword(password),
    forcePasswordReset: false,
    passwordChangedAt: now,
  })
}

export function presentAdminUser(user: AdminUser) {
  return {
    id: user.id,
    email: user.email,
    firstName: user.firstName,
    lastName: user.lastName,
    role: user.role,
    forcePasswordReset: user.forcePasswordReset,
    passwordChangedAt: user.passwordChangedAt,
    lastLoginAt: user.lastLoginAt,
  }
}
