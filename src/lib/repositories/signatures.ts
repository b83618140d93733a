import type { Signature, SignatureQuery, SignatureRepository, SignatureState } from '@/types/models'
import { RECEIPT_COLUMNS, buildAssignments, expectRow, type Queryable } from './sql'

type SignatureRow = {
  id: number
  petition_id: number
  name: string
  email: string
  postcode: string | null
  location: string
  uk_citizenship: boolean
  notify_by_email: boolean
  state: SignatureState
  perishable_token: string
  sponsor: boolean
  validated_at: Date | null
  created_at: Date
  updated_at: Date
}

const COLUMNS = {
  state: 'state',
  validatedAt: 'validated_at',
  notifyByEmail: 'notify_by_email',
} as const

function toSignature(row: SignatureRow): Signature {
  return {
    id: row.id,
    petitionId: row.petition_id,
    name: row.name,
    email: row.email,
    postcode: row.postcode,
    location: row.location,
    ukCitizenship: row.uk_citizenship,
    notifyByEmail: row.notify_by_email,
    state: row.state,
    perishableToken: row.perishable_token,
    sponsor: row.sponsor,
    validatedAt: row.validated_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }
}

export function buildSignatureWhere(query: SignatureQuery): { where: string; params: unknown[] } {
  const params: unknown[] = [query.petitionId]
  const conditions = ['s.petition_id = $1']

  if (query.state) {
    params.push(query.state)
    conditions.push(`s.state = $${params.length}`)
  }
  if (query.notifyByEmail !== undefined) {
    params.push(query.notifyByEmail)
    conditions.push(`s.notify_by_email = $${params.length}`)
  }
  if (query.sponsor !== undefined) {
    params.push(query.sponsor)
    conditions.push(`s.sponsor = $${params.length}`)
  }
  if (query.emailNotSent) {
    const column = `r.${RECEIPT_COLUMNS[query.emailNotSent.name]}`
    params.push(query.emailNotSent.before)
    conditions.push(`(${column} IS NULL OR ${column} < $${params.length})`)
  }

  return {
    where: ` WHERE ${conditions.join(' AND ')}`,
    params,
  }
}

const FROM = 'FROM signatures s LEFT JOIN email_sent_receipts r ON r.signature_id = s.id'

export function createSignatureRepository(pool: Queryable): SignatureRepository {
  return {
    async create(attrs) {
      const { rows } = await pool.query<SignatureRow>(
        `INSERT INTO signatures
           (petition_id, name, email, postcode, location, uk_citizenship, notify_by_email, perishable_token, sponsor)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9) RETURNING *`,
        [
          attrs.petitionId,
          attrs.name,
          attrs.email,
          attrs.postcode,
          attrs.location,
          attrs.ukCitizenship,
          attrs.notifyByEmail,
          attrs.perishableToken,
          attrs.sponsor,
        ]
      )
      return toSignature(expectRow(rows, 'Signature'))
    },

    async findById(id) {
      const { rows } = await pool.query<SignatureRow>('SELECT * FROM signatures WHERE id = $1', [id])
      return rows[0] ? toSignature(rows[0]) : null
    },

    async findByEmail(petitionId, email) {
      const { rows } = await pool.query<SignatureRow>(
        'SELECT * FROM signatures WHERE petition_id = $1 AND LOWER(email) = LOWER($2)',
        [petitionId, email]
      )
      return rows[0] ? toSignature(rows[0]) : null
    },

    async findMany(query) {
      const { where, params } = buildSignatureWhere(query)
      const { rows } = await pool.query<SignatureRow>(`SELECT s.* ${FROM}${where} ORDER BY s.id ASC`, params)
      return rows.map(toSignature)
    },

    async count(query) {
      const { where, params } = buildSignatureWhere(query)
      const { rows } = await pool.query<{ count: string }>(`SELECT COUNT(*) AS count ${FROM}${where}`, params)
      return Number(expectRow(rows, 'Signature count').count)
    },

    async update(id, changes) {
      const { sql, params } = buildAssignments(COLUMNS, changes, 2)
      const { rows } = await pool.query<SignatureRow>(
        `UPDATE signatures SET ${sql} WHERE id = $1 RETURNING *`,
        [id, ...params]
      )
      return toSignature(expectRow(rows, `Signature ${id}`))
    },

    async markValidated(id, at) {
      const { rows } = await pool.query<SignatureRow>(
        `UPDATE signatures SET state = 'validated', validated_at = $2, updated_at = NOW()
         WHERE id = $1 AND state = 'pending' RETURNING *`,
        [id, at]
      )
      return rows[0] ? toSignature(rows[0]) : null
    },

    async getEmailSentAt(id, name) {
      const column = RECEIPT_COLUMNS[name]
      const { rows } = await pool.query<{ value: Date | null }>(
        `SELECT ${column} AS value FROM email_sent_receipts WHERE signature_id = $1`,
        [id]
      )
      return rows[0]?.value ?? null
    },

    async setEmailSentAt(id, name, time) {
      const column = RECEIPT_COLUMNS[name]
      await pool.query(
        `INSERT INTO email_sent_receipts (signature_id, ${column}) VALUES ($1, $2)
         ON CONFLICT (signature_id) DO UPDATE SET ${column} = EXCLUDED.${column}`,
        [id, time]
      )
    },
  }
}
