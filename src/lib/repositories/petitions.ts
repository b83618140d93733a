import type {
  Petition,
  PetitionChanges,
  PetitionQuery,
  PetitionRepository,
  PetitionState,
} from '@/types/models'
import { RECEIPT_COLUMNS, buildAssignments, expectFound, expectRow, type Queryable } from './sql'

type PetitionRow = {
  id: number
  action: string
  background: string
  additional_details: string | null
  state: PetitionState
  signature_count: number
  creator_signature_id: number | null
  sponsor_token: string
  opened_at: Date | null
  closed_at: Date | null
  rejection_code: string | null
  rejection_details: string | null
  response: string | null
  response_summary: string | null
  scheduled_debate_date: string | null
  moderation_threshold_reached_at: Date | null
  response_threshold_reached_at: Date | null
  debate_threshold_reached_at: Date | null
  created_at: Date
  updated_at: Date
}

// `date` columns come back as text so no timezone shift is applied
const SELECT = `SELECT id, action, background, additional_details, state, signature_count,
  creator_signature_id, sponsor_token, opened_at, closed_at, rejection_code, rejection_details,
  response, response_summary, scheduled_debate_date::text AS scheduled_debate_date,
  moderation_threshold_reached_at, response_threshold_reached_at, debate_threshold_reached_at,
  created_at, updated_at FROM petitions`

const COLUMNS: Record<keyof PetitionChanges, string> = {
  action: 'action',
  background: 'background',
  additionalDetails: 'additional_details',
  state: 'state',
  signatureCount: 'signature_count',
  creatorSignatureId: 'creator_signature_id',
  sponsorToken: 'sponsor_token',
  openedAt: 'opened_at',
  closedAt: 'closed_at',
  rejectionCode: 'rejection_code',
  rejectionDetails: 'rejection_details',
  response: 'response',
  responseSummary: 'response_summary',
  scheduledDebateDate: 'scheduled_debate_date',
  moderationThresholdReachedAt: 'moderation_threshold_reached_at',
  responseThresholdReachedAt: 'response_threshold_reached_at',
  debateThresholdReachedAt: 'debate_threshold_reached_at',
}

const ORDER_BY = {
  newest: 'created_at DESC, id DESC',
  signatureCount: 'signature_count ASC, id ASC',
  mostSigned: 'signature_count DESC, id ASC',
} as const

function toPetition(row: PetitionRow): Petition {
  return {
    id: row.id,
    action: row.action,
    background: row.background,
    additionalDetails: row.additional_details,
    state: row.state,
    signatureCount: row.signature_count,
    creatorSignatureId: row.creator_signature_id,
    sponsorToken: row.sponsor_token,
    openedAt: row.opened_at,
    closedAt: row.closed_at,
    rejectionCode: row.rejection_code,
    rejectionDetails: row.rejection_details,
    response: row.response,
    responseSummary: row.response_summary,
    scheduledDebateDate: row.scheduled_debate_date,
    moderationThresholdReachedAt: row.moderation_threshold_reached_at,
    responseThresholdReachedAt: row.response_threshold_reached_at,
    debateThresholdReachedAt: row.debate_threshold_reached_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }
}

/**
 * Translates a petition query into a WHERE clause and its parameters.
 */
export function buildPetitionWhere(query: PetitionQuery): { where: string; params: unknown[] } {
  const conditions: string[] = []
  const params: unknown[] = []

  if (query.states) {
    params.push([...query.states])
    conditions.push(`state = ANY($${params.length})`)
  }

  if (query.minSignatureCount !== undefined) {
    params.push(query.minSignatureCount)
    conditions.push(`signature_count >= $${params.length}`)
  }

  if (query.search) {
    params.push(`%${query.search.replace(/[\\%_]/g, c => `\\${c}`)}%`)
    conditions.push(`(action ILIKE $${params.length} OR background ILIKE $${params.length})`)
  }

  if (query.openedBefore) {
    params.push(query.openedBefore)
    conditions.push(`opened_at <= $${params.length}`)
  }

  return {
    where: conditions.length > 0 ? ` WHERE ${conditions.join(' AND ')}` : '',
    params,
  }
}

export function buildPetitionQuery(query: PetitionQuery): { sql: string; params: unknown[] } {
  const { where, params } = buildPetitionWhere(query)
  let sql = `${SELECT}${where} ORDER BY ${ORDER_BY[query.order ?? 'newest']}`

  if (query.limit !== undefined) {
    params.push(query.limit)
    sql += ` LIMIT $${params.length}`
  }
  if (query.offset !== undefined) {
    params.push(query.offset)
    sql += ` OFFSET $${params.length}`
  }

  return { sql, params }
}

export function createPetitionRepository(pool: Queryable): PetitionRepository {
  async function findById(id: number): Promise<Petition | null> {
    const { rows } = await pool.query<PetitionRow>(`${SELECT} WHERE id = $1`, [id])
    return rows[0] ? toPetition(rows[0]) : null
  }

  return {
    findById,

    async create(attrs) {
      const { rows } = await pool.query<{ id: number }>(
        `INSERT INTO petitions (action, background, additional_details, sponsor_token, state)
         VALUES ($1, $2, $3, $4, $5) RETURNING id`,
        [attrs.action, attrs.background, attrs.additionalDetails, attrs.sponsorToken, attrs.state ?? 'pending']
      )
      const { id } = expectRow(rows, 'Petition')
      return expectFound(await findById(id), `Petition ${id}`)
    },

    async findMany(query) {
      const { sql, params } = buildPetitionQuery(query)
      const { rows } = await pool.query<PetitionRow>(sql, params)
      return rows.map(toPetition)
    },

    async count(query) {
      const { where, params } = buildPetitionWhere(query)
      const { rows } = await pool.query<{ count: string }>(`SELECT COUNT(*) AS count FROM petitions${where}`, params)
      return Number(expectRow(rows, 'Petition count').count)
    },

    async update(id, changes) {
      const { sql, params } = buildAssignments(COLUMNS, changes, 2)
      await pool.query(`UPDATE petitions SET ${sql} WHERE id = $1`, [id, ...params])
      return expectFound(await findById(id), `Petition ${id}`)
    },

    async incrementSignatureCount(id) {
      const { rows } = await pool.query<{ signature_count: number }>(
        `UPDATE petitions SET signature_count = signature_count + 1, updated_at = NOW()
         WHERE id = $1 RETURNING signature_count`,
        [id]
      )
      return expectRow(rows, `Petition ${id}`).signature_count
    },

    async getEmailRequestedAt(id, name) {
      const column = RECEIPT_COLUMNS[name]
      const { rows } = await pool.query<{ value: Date | null }>(
        `SELECT ${column} AS value FROM email_requested_receipts WHERE petition_id = $1`,
        [id]
      )
      return rows[0]?.value ?? null
    },

    async setEmailRequestedAt(id, name, time) {
      const column = RECEIPT_COLUMNS[name]
      await pool.query(
        `INSERT INTO email_requested_receipts (petition_id, ${column}) VALUES ($1, $2)
         ON CONFLICT (petition_id) DO UPDATE SET ${column} = EXCLUDED.${column}`,
        [id, time]
      )
    },
  }
}
