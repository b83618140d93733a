import { NextRequest, NextResponse } from 'next/server'
import { requirePublicSite } from '@/lib/site-access'
import { errorResponse } from '@/lib/errors'

// GET /api/site - Public site configuration
export async function GET(req: NextRequest) {
  try {
    const access = await requirePublicSite(req)
    if (!access.allowed) return access.response
    const { site } = access

    return NextResponse.json({
      title: site.title,
      url: site.url,
      feedbackEmail: site.feedbackEmail,
      host: site.host,
      hostWithPort: site.hostWithPort,
      moderateHostWithPort: site.moderateHostWithPort,
      constraintsForPublic: site.constraintsForPublic,
      constraintsForModeration: site.constraintsForModeration,
      petitionDuration: site.petitionDuration,
      minimumNumberOfSponsors: site.minimumNumberOfSponsors,
      maximumNumberOfSponsors: site.maximumNumberOfSponsors,
      thresholds: {
        moderation: site.formattedThresholdForModeration,
        response: site.formattedThresholdForResponse,
        debate: site.formattedThresholdForDebate,
      },
    })
  } catch (error) {
    return errorResponse(error, 'Failed to load site')
  }
}

export const dynamic = 'force-dynamic'
