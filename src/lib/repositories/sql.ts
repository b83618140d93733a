import type { Pool } from 'pg'
import type { EmailReceiptName } from '@/types/models'

export type Queryable = Pick<Pool, 'query'>

/**
 * Builds `SET col = $n, ...` from camelCase changes using a column map.
 * Keys missing from the map are ignored; `updated_at` is always bumped.
 */
export function buildAssignments(
  columns: Readonly<Record<string, string>>,
  changes: object,
  firstIndex = 1
): { sql: string; params: unknown[] } {
  const assignments: string[] = []
  const params: unknown[] = []

  for (const [key, value] of Object.entries(changes)) {
    const column = columns[key]
    if (!column || value === undefined) continue
    params.push(value)
    assignments.push(`${column} = $${firstIndex + params.length - 1}`)
  }

  assignments.push('updated_at = NOW()')
  return { sql: assignments.join(', '), params }
}

export function expectRow<T>(rows: T[], what: string): T {
  const [row] = rows
  if (!row) throw new Error(`${what} not found`)
  return row
}

export function expectFound<T>(value: T | null, what: string): T {
  if (value === null) throw new Error(`${what} not found`)
  return value
}

// Receipt names are interpolated as column names, so only these may reach SQL
export const RECEIPT_COLUMNS: Readonly<Record<EmailReceiptName, string>> = {
  government_response: 'government_response',
  debate_outcome: 'debate_outcome',
  debate_scheduled: 'debate_scheduled',
  petition_email: 'petition_email',
}
