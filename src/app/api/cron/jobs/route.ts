import { NextRequest, NextResponse } from 'next/server'
import { requireCronSecret } from '@/lib/site-access'
import { performPendingJobs } from '@/lib/jobs'
import { jobHandlers } from '@/lib/notifications'
import { errorResponse } from '@/lib/errors'

// GET /api/cron/jobs - Drain the job queue
export async function GET(req: NextRequest) {
  const denied = requireCronSecret(req)
  if (denied) return denied

  try {
    const result = await performPendingJobs(jobHandlers)
    return NextResponse.json(result)
  } catch (error) {
    return errorResponse(error, 'Failed to perform jobs')
  }
}

export const dynamic = 'force-dynamic'
