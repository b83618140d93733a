import { NextResponse, type NextRequest } from 'next/server'
import { getSite, type Site } from './site'
import { errorResponse, ServiceUnavailable } from './errors'

function parseBasicAuth(header: string | null): { username: string; password: string } | null {
  if (!header?.startsWith('Basic ')) return null
  const decoded = Buffer.from(header.slice('Basic '.length), 'base64').toString('utf8')
  const separator = decoded.indexOf(':')
  if (separator < 0) return null
  return { username: decoded.slice(0, separator), password: decoded.slice(separator + 1) }
}

/**
 * Gate for public endpoints: a disabled site answers 503 and a protected
 * site requires HTTP basic auth with the site credentials.
 */
export async function requirePublicSite(
  req: NextRequest
): Promise<{ allowed: true; site: Site } | { allowed: false; response: NextResponse }> {
  const site = await getSite()

  if (!site.enabled) {
    const response = errorResponse(new ServiceUnavailable('The petitions site is temporarily unavailable'), 'Unavailable')
    response.headers.set('Retry-After', '300')
    return { allowed: false, response }
  }

  if (site.protected) {
    const credentials = parseBasicAuth(req.headers.get('authorization'))
    if (!credentials || !(await site.authenticate(credentials.username, credentials.password))) {
      return {
        allowed: false,
        response: NextResponse.json(
          { error: 'Unauthorized' },
          { status: 401, headers: { 'WWW-Authenticate': `Basic realm="${site.title.replace(/"/g, '')}"` } }
        ),
      }
    }
  }

  return { allowed: true, site }
}

export function requireCronSecret(req: NextRequest): NextResponse | null {
  const cronSecret = process.env.CRON_SECRET
  if (!cronSecret) {
    console.error('[cron] CRON_SECRET not configured')
    return NextResponse.json({ error: 'Server misconfigured' }, { status: 500 })
  }
  if (req.headers.get('authorization') !== `Bearer ${cronSecret}`) {
    return NextResponse.json({ error: 'Unauthorized' }, { status: 401 })
  }
  return null
}
