import type { AdminRole, AdminUser, AdminUserRepository } from '@/types/models'
import { buildAssignments, expectRow, type Queryable } from './sql'

type AdminUserRow = {
  id: number
  email: string
  first_name: string
  last_name: string
  role: AdminRole
  password_digest: string
  force_password_reset: boolean
  password_changed_at: Date | null
  failed_login_count: number
  last_login_at: Date | null
  created_at: Date
  updated_at: Date
}

const COLUMNS = {
  passwordDigest: 'password_digest',
  forcePasswordReset: 'force_password_reset',
  passwordChangedAt: 'password_changed_at',
  failedLoginCount: 'failed_login_count',
  lastLoginAt: 'last_login_at',
} as const

function toAdminUser(row: AdminUserRow): AdminUser {
  return {
    id: row.id,
    email: row.email,
    firstName: row.first_name,
    lastName: row.last_name,
    role: row.role,
    passwordDigest: row.password_digest,
    forcePasswordReset: row.force_password_reset,
    passwordChangedAt: row.password_changed_at,
    failedLoginCount: row.failed_login_count,
    lastLoginAt: row.last_login_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }
}

export function createAdminUserRepository(pool: Queryable): AdminUserRepository {
  return {
    async create(attrs) {
      const { rows } = await pool.query<AdminUserRow>(
        `INSERT INTO admin_users
           (email, first_name, last_name, role, password_digest, force_password_reset, password_changed_at)
         VALUES (LOWER($1), $2, $3, $4, $5, $6, $7) RETURNING *`,
        [
          attrs.email,
          attrs.firstName,
          attrs.lastName,
          attrs.role,
          attrs.passwordDigest,
          attrs.forcePasswordReset ?? true,
          attrs.passwordChangedAt ?? null,
        ]
      )
      return toAdminUser(expectRow(rows, 'Admin user'))
    },

    async findById(id) {
      const { rows } = await pool.query<AdminUserRow>('SELECT * FROM admin_users WHERE id = $1', [id])
      return rows[0] ? toAdminUser(rows[0]) : null
    },

    async findByEmail(email) {
      const { rows } = await pool.query<AdminUserRow>(
        'SELECT * FROM admin_users WHERE email = LOWER($1)',
        [email]
      )
      return rows[0] ? toAdminUser(rows[0]) : null
    },

    async update(id, changes) {
      const { sql, params } = buildAssignments(COLUMNS, changes, 2)
      const { rows } = await pool.query<AdminUserRow>(
        `UPDATE admin_users SET ${sql} WHERE id = $1 RETURNING *`,
        [id, ...params]
      )
      return toAdminUser(expectRow(rows, `Admin user ${id}`))
    },
  }
}
