import bcrypt from 'bcryptjs'
import { NextRequest } from 'next/server'
import { vi } from 'vitest'
import { db } from '@/lib/db'
import { getSite, resetSite } from '@/lib/site'
import { getAdminSession } from '@/lib/admin-session'
import type { AdminRole, AdminUser, Petition, PetitionChanges, SiteAttributes, Signature } from '@/types/models'

export const BASE_URL = 'https://petition.parliament.uk'

let counter = 0

function unique(prefix: string) {
  counter += 1
  return `${prefix}-${counter}`
}

/**
 * Apply site settings on top of the environment defaults
 */
export async function configureSite(changes: Partial<SiteAttributes>) {
  const site = await getSite()
  await db.sites.update(site.record.id, changes)
  resetSite()
  return getSite()
}

export async function createSignature(
  petition: Pick<Petition, 'id'>,
  overrides: Partial<Pick<Signature, 'name' | 'email' | 'state' | 'notifyByEmail' | 'sponsor' | 'location' | 'postcode'>> = {}
): Promise<Signature> {
  const signature = await db.signatures.create({
    petitionId: petition.id,
    name: overrides.name ?? 'Suzie Signer',
    email: overrides.email ?? `${unique('signer')}@example.com`,
    postcode: overrides.postcode ?? 'SW1A1AA',
    location: overrides.location ?? 'GB',
    ukCitizenship: true,
    notifyByEmail: overrides.notifyByEmail ?? false,
    perishableToken: unique('token'),
    sponsor: overrides.sponsor ?? false,
  })

  const state = overrides.state ?? 'validated'
  if (state === 'pending') return signature
  return db.signatures.update(signature.id, { state, validatedAt: new Date() })
}

/**
 * A petition with a creator signature. Defaults to `open` and validated.
 */
export async function createPetition(
  overrides: PetitionChanges & { creatorEmail?: string; creatorNotify?: boolean } = {}
): Promise<Petition> {
  const { creatorEmail, creatorNotify, ...changes } = overrides
  const created = await db.petitions.create({
    action: overrides.action ?? `Petition ${unique('action')}`,
    background: overrides.background ?? 'Because it matters',
    additionalDetails: null,
    sponsorToken: unique('sponsor'),
  })

  const creator = await createSignature(created, {
    name: 'Charlie Creator',
    email: creatorEmail ?? `${unique('creator')}@example.com`,
    notifyByEmail: creatorNotify ?? true,
    state: overrides.state === 'pending' ? 'pending' : 'validated',
  })

  return db.petitions.update(created.id, {
    state: 'open',
    signatureCount: creator.state === 'validated' ? 1 : 0,
    openedAt: overrides.state === undefined || overrides.state === 'open' ? new Date() : null,
    ...changes,
    creatorSignatureId: creator.id,
  })
}

export async function createAdminUser(
  overrides: {
    email?: string
    role?: AdminRole
    password?: string
    forcePasswordReset?: boolean
    passwordChangedAt?: Date | null
  } = {}
): Promise<AdminUser> {
  return db.adminUsers.create({
    email: overrides.email ?? `${unique('admin')}@example.com`,
    firstName: 'Admin',
    lastName: 'User',
    role: overrides.role ?? 'moderator',
    // Low cost keeps the suite fast; compare works with any cost
    passwordDigest: bcrypt.hashSync(overrides.password ?? 'Letmein1!', 4),
    forcePasswordReset: overrides.forcePasswordReset ?? false,
    passwordChangedAt: overrides.passwordChangedAt === undefined ? new Date() : overrides.passwordChangedAt,
  })
}

export function loginAs(user: Pick<AdminUser, 'email'>) {
  vi.mocked(getAdminSession).mockResolvedValue({ email: user.email })
}

export function request(
  method: string,
  path: string,
  body?: unknown,
  headers: Record<string, string> = {}
): NextRequest {
  return new NextRequest(new URL(path, BASE_URL), {
    method,
    headers: body === undefined ? headers : { 'content-type': 'application/json', ...headers },
    body: body === undefined ? undefined : JSON.stringify(body),
  })
}

export function routeParams(id: number | string) {
  return { params: Promise.resolve({ id: String(id) }) }
}
