import { NextRequest, NextResponse } from 'next/server'
import { requirePublicSite } from '@/lib/site-access'
import { createPetition, listVisiblePetitions, presentPetition } from '@/lib/petitions'
import { signatureInputFrom } from '@/lib/signatures'
import { checkRateLimit } from '@/lib/rate-limit'
import { errorResponse } from '@/lib/errors'
import { clientIp, integerParam, nested, readJson, stringParam } from '@/lib/http'

// GET /api/petitions - Open, closed and rejected petitions, most signed first
export async function GET(req: NextRequest) {
  try {
    const access = await requirePublicSite(req)
    if (!access.allowed) return access.response

    const search = req.nextUrl.searchParams
    const result = await listVisiblePetitions({
      state: search.get('state'),
      search: search.get('q'),
      page: integerParam(search.get('page'), 1),
    })

    return NextResponse.json({ ...result, petitions: result.petitions.map(presentPetition) })
  } catch (error) {
    return errorResponse(error, 'Failed to fetch petitions')
  }
}

// POST /api/petitions - Start a petition
export async function POST(req: NextRequest) {
  try {
    const access = await requirePublicSite(req)
    if (!access.allowed) return access.response

    if (checkRateLimit('petition', clientIp(req))) {
      return NextResponse.json({ error: 'Too many petitions. Try again later.' }, { status: 429 })
    }

    const body = nested(await readJson(req), 'petition')
    const petition = await createPetition({
      action: stringParam(body, 'action'),
      background: stringParam(body, 'background'),
      additionalDetails: stringParam(body, 'additionalDetails'),
      creator: signatureInputFrom(nested(body, 'creator')),
    })

    return NextResponse.json({ petition: presentPetition(petition) }, { status: 201 })
  } catch (error) {
    return errorResponse(error, 'Failed to create petition')
  }
}
