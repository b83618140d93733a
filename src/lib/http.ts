import type { NextRequest } from 'next/server'
import { HttpError, RecordNotFound } from './errors'

export type Params = Record<string, unknown>

export interface RouteContext {
  params: Promise<{ id: string }>
}

/**
 * Read a JSON object body. Anything that is not an object is rejected with 400.
 */
export async function readJson(req: NextRequest): Promise<Params> {
  let body: unknown
  try {
    body = await req.json()
  } catch {
    throw new HttpError('Invalid JSON body', 400, 'INVALID_JSON')
  }
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new HttpError('Expected a JSON object', 400, 'INVALID_JSON')
  }
  return { ...body }
}

/** Nested params such as `{ petition: { response } }` fall back to the top level. */
export function nested(body: Params, key: string): Params {
  const value = body[key]
  return typeof value === 'object' && value !== null && !Array.isArray(value) ? { ...value } : body
}

export function stringParam(params: Params, key: string): string | undefined {
  const value = params[key]
  if (typeof value === 'string') return value
  if (typeof value === 'number') return String(value)
  return undefined
}

/** Checkbox semantics: `'1'`, `'true'`, `true` and `1` are on. */
export function booleanParam(params: Params, key: string): boolean {
  const value = params[key]
  return value === true || value === 1 || value === '1' || value === 'true'
}

export function integerParam(value: string | null | undefined, fallback: number): number {
  if (!value) return fallback
  const parsed = Number.parseInt(value, 10)
  return Number.isNaN(parsed) || parsed < 1 ? fallback : parsed
}

// Largest value of a Postgres integer column
const MAX_ID = 2147483647

export function parseId(id: string): number {
  if (!/^\d+$/.test(id)) throw new RecordNotFound()
  const value = Number(id)
  if (value > MAX_ID) throw new RecordNotFound()
  return value
}

export function clientIp(req: NextRequest): string {
  return req.headers.get('x-forwarded-for')?.split(',')[0]?.trim() || 'unknown'
}
