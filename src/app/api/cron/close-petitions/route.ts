import { NextRequest, NextResponse } from 'next/server'
import { requireCronSecret } from '@/lib/site-access'
import { closeExpiredPetitions } from '@/lib/petitions'
import { errorResponse } from '@/lib/errors'

// GET /api/cron/close-petitions - Close open petitions past their duration
export async function GET(req: NextRequest) {
  const denied = requireCronSecret(req)
  if (denied) return denied

  try {
    const closed = await closeExpiredPetitions()
    return NextResponse.json({ closed })
  } catch (error) {
    return errorResponse(error, 'Failed to close petitions')
  }
}

export const dynamic = 'force-dynamic'
