import { NextRequest, NextResponse } from 'next/server'
import { requireAdmin } from '@/lib/admin-guard'
import { updateSite, type Site, type SiteUpdate } from '@/lib/site'
import { errorResponse } from '@/lib/errors'
import { booleanParam, nested, readJson, stringParam, type Params } from '@/lib/http'

const TEXT_FIELDS = ['title', 'url', 'emailFrom', 'feedbackEmail'] as const
const FLAG_FIELDS = ['enabled', 'protected'] as const
const NUMBER_FIELDS = [
  'petitionDuration',
  'minimumNumberOfSponsors',
  'maximumNumberOfSponsors',
  'thresholdForModeration',
  'thresholdForResponse',
  'thresholdForDebate',
] as const

// Non-numeric input stays NaN so validation reports it
function toNumber(value: unknown): number {
  if (typeof value === 'number') return value
  if (typeof value === 'string' && /^\s*-?\d+(\.\d+)?\s*$/.test(value)) return Number(value)
  return Number.NaN
}

/** Only the keys present in the body are changed. */
function siteUpdateFrom(body: Params): SiteUpdate {
  const update: SiteUpdate = {}

  for (const field of TEXT_FIELDS) {
    const value = stringParam(body, field)
    if (value !== undefined) update[field] = value.trim()
  }
  for (const field of FLAG_FIELDS) {
    if (field in body) update[field] = booleanParam(body, field)
  }
  for (const field of NUMBER_FIELDS) {
    if (field in body) update[field] = toNumber(body[field])
  }

  if ('username' in body) update.username = stringParam(body, 'username')?.trim() || null
  if ('password' in body) update.password = stringParam(body, 'password') ?? null
  if ('passwordConfirmation' in body) update.passwordConfirmation = stringParam(body, 'passwordConfirmation') ?? null

  return update
}

function presentSite(site: Site) {
  const { passwordDigest, ...settings } = site.record
  return { ...settings, passwordSet: passwordDigest !== null }
}

// GET /api/admin/site - Site settings (sysadmins only)
export async function GET() {
  try {
    const auth = await requireAdmin({ sysadmin: true })
    if (!auth.authorized) return auth.response

    return NextResponse.json({ site: presentSite(auth.site) })
  } catch (error) {
    return errorResponse(error, 'Failed to fetch site settings')
  }
}

// PATCH /api/admin/site - Update site settings (sysadmins only)
export async function PATCH(req: NextRequest) {
  try {
    const auth = await requireAdmin({ sysadmin: true })
    if (!auth.authorized) return auth.response

    const site = await updateSite(siteUpdateFrom(nested(await readJson(req), 'site')))
    console.log(`[site] Settings changed by ${auth.user.email}`)

    return NextResponse.json({ site: presentSite(site) })
  } catch (error) {
    return errorResponse(error, 'Failed to update site settings')
  }
}

export const dynamic = 'force-dynamic'
