import type { JobRecord, JobRepository, JobStatus } from '@/types/models'
import { expectRow, type Queryable } from './sql'

type JobRow = {
  id: number
  name: string
  payload: unknown
  status: JobStatus
  attempts: number
  last_error: string | null
  run_at: Date
  completed_at: Date | null
  created_at: Date
}

function toJob(row: JobRow): JobRecord {
  return {
    id: row.id,
    name: row.name,
    payload: row.payload,
    status: row.status,
    attempts: row.attempts,
    lastError: row.last_error,
    runAt: row.run_at,
    completedAt: row.completed_at,
    createdAt: row.created_at,
  }
}

export function createJobRepository(pool: Queryable): JobRepository {
  return {
    async enqueue(name, payload, runAt) {
      const { rows } = await pool.query<JobRow>(
        'INSERT INTO jobs (name, payload, run_at) VALUES ($1, $2, $3) RETURNING *',
        [name, JSON.stringify(payload), runAt]
      )
      return toJob(expectRow(rows, 'Job'))
    },

    async claimRunnable(now, limit) {
      const { rows } = await pool.query<JobRow>(
        `UPDATE jobs SET status = 'running'
         WHERE id IN (
           SELECT id FROM jobs WHERE status = 'pending' AND run_at <= $1
           ORDER BY id ASC LIMIT $2
           FOR UPDATE SKIP LOCKED
         )
         RETURNING *`,
        [now, limit]
      )
      return rows.map(toJob).sort((a, b) => a.id - b.id)
    },

    async markCompleted(id, at) {
      await pool.query(
        `UPDATE jobs SET status = 'completed', attempts = attempts + 1, completed_at = $2 WHERE id = $1`,
        [id, at]
      )
    },

    async markFailed(id, error, retryAt) {
      await pool.query(
        `UPDATE jobs SET attempts = attempts + 1, last_error = $2,
           status = CASE WHEN $3::timestamptz IS NULL THEN 'failed' ELSE 'pending' END,
           run_at = COALESCE($3::timestamptz, run_at)
         WHERE id = $1`,
        [id, error, retryAt]
      )
    },

    async findMany(query) {
      const conditions: string[] = []
      const params: unknown[] = []
      if (query.status) {
        params.push(query.status)
        conditions.push(`status = $${params.length}`)
      }
      if (query.name) {
        params.push(query.name)
        conditions.push(`name = $${params.length}`)
      }
      const where = conditions.length > 0 ? ` WHERE ${conditions.join(' AND ')}` : ''
      const { rows } = await pool.query<JobRow>(`SELECT * FROM jobs${where} ORDER BY id ASC`, params)
      return rows.map(toJob)
    },
  }
}
