import { NextRequest, NextResponse } from 'next/server'
import { requireAdmin } from '@/lib/admin-guard'
import { listSelectablePetitions, presentAdminPetition } from '@/lib/petitions'
import { errorResponse } from '@/lib/errors'
import { integerParam } from '@/lib/http'

// GET /api/admin/petitions - Petitions moderators can work on, newest first
export async function GET(req: NextRequest) {
  try {
    const auth = await requireAdmin()
    if (!auth.authorized) return auth.response

    const search = req.nextUrl.searchParams
    const result = await listSelectablePetitions({
      state: search.get('state'),
      search: search.get('q'),
      page: integerParam(search.get('page'), 1),
    })

    return NextResponse.json({
      ...result,
      petitions: await Promise.all(result.petitions.map(presentAdminPetition)),
    })
  } catch (error) {
    return errorResponse(error, 'Failed to fetch petitions')
  }
}

export const dynamic = 'force-dynamic'
