import { NextResponse } from 'next/server'
import { requireAdmin } from '@/lib/admin-guard'
import { presentAdminPetition, thresholdPetitions } from '@/lib/petitions'
import { errorResponse } from '@/lib/errors'

// GET /api/admin/petitions/threshold - Petitions past the debate threshold, fewest signatures first
export async function GET() {
  try {
    const auth = await requireAdmin()
    if (!auth.authorized) return auth.response

    const petitions = await thresholdPetitions()
    return NextResponse.json({ petitions: await Promise.all(petitions.map(presentAdminPetition)) })
  } catch (error) {
    return errorResponse(error, 'Failed to fetch threshold petitions')
  }
}

export const dynamic = 'force-dynamic'
