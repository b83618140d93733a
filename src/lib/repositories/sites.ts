import type { SiteAttributes, SiteRecord, SiteRepository } from '@/types/models'
import { buildAssignments, expectRow, type Queryable } from './sql'

type SiteRow = {
  id: number
  title: string
  url: string
  email_from: string
  feedback_email: string
  username: string | null
  password_digest: string | null
  enabled: boolean
  protected: boolean
  petition_duration: number
  minimum_number_of_sponsors: number
  maximum_number_of_sponsors: number
  threshold_for_moderation: number
  threshold_for_response: number
  threshold_for_debate: number
  created_at: Date
  updated_at: Date
}

const COLUMNS: Record<keyof SiteAttributes, string> = {
  title: 'title',
  url: 'url',
  emailFrom: 'email_from',
  feedbackEmail: 'feedback_email',
  username: 'username',
  passwordDigest: 'password_digest',
  enabled: 'enabled',
  protected: 'protected',
  petitionDuration: 'petition_duration',
  minimumNumberOfSponsors: 'minimum_number_of_sponsors',
  maximumNumberOfSponsors: 'maximum_number_of_sponsors',
  thresholdForModeration: 'threshold_for_moderation',
  thresholdForResponse: 'threshold_for_response',
  thresholdForDebate: 'threshold_for_debate',
}

function toSite(row: SiteRow): SiteRecord {
  return {
    id: row.id,
    title: row.title,
    url: row.url,
    emailFrom: row.email_from,
    feedbackEmail: row.feedback_email,
    username: row.username,
    passwordDigest: row.password_digest,
    enabled: row.enabled,
    protected: row.protected,
    petitionDuration: row.petition_duration,
    minimumNumberOfSponsors: row.minimum_number_of_sponsors,
    maximumNumberOfSponsors: row.maximum_number_of_sponsors,
    thresholdForModeration: row.threshold_for_moderation,
    thresholdForResponse: row.threshold_for_response,
    thresholdForDebate: row.threshold_for_debate,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }
}

export function createSiteRepository(pool: Queryable): SiteRepository {
  return {
    async first() {
      const { rows } = await pool.query<SiteRow>('SELECT * FROM sites ORDER BY id LIMIT 1')
      return rows[0] ? toSite(rows[0]) : null
    },

    async create(attrs) {
      const keys = Object.keys(COLUMNS) as (keyof SiteAttributes)[]
      const placeholders = keys.map((_, i) => `$${i + 1}`).join(', ')
      const { rows } = await pool.query<SiteRow>(
        `INSERT INTO sites (${keys.map(k => COLUMNS[k]).join(', ')}) VALUES (${placeholders}) RETURNING *`,
        keys.map(k => attrs[k])
      )
      return toSite(expectRow(rows, 'Site'))
    },

    async update(id, attrs) {
      const { sql, params } = buildAssignments(COLUMNS, attrs, 2)
      const { rows } = await pool.query<SiteRow>(
        `UPDATE sites SET ${sql} WHERE id = $1 RETURNING *`,
        [id, ...params]
      )
      return toSite(expectRow(rows, `Site ${id}`))
    },
  }
}
