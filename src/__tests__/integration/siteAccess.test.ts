import { describe, it, expect } from 'vitest'
import bcrypt from 'bcryptjs'
import { GET as showSite } from '@/app/api/site/route'
import { GET as listPetitions } from '@/app/api/petitions/route'
import { GET as listAdminPetitions } from '@/app/api/admin/petitions/route'
import { GET as showSettings, PATCH as updateSettings } from '@/app/api/admin/site/route'
import { GET as showProfile, PATCH as updateProfile } from '@/app/api/admin/profile/[id]/route'
import { BASE_URL, configureSite, createAdminUser, loginAs, request, routeParams } from '../helpers/factories'

function basicAuth(username: string, password: string) {
  return { authorization: `Basic ${Buffer.from(`${username}:${password}`).toString('base64')}` }
}

describe('public site', () => {
  it('describes the site', async () => {
    const res = await showSite(request('GET', '/api/site'))
    const body = await res.json()

    expect(res.status).toBe(200)
    expect(body.title).toBe('Petition parliament')
    expect(body.moderateHostWithPort).toBe('moderate.petition.parliament.uk')
    expect(body.thresholds).toEqual({ moderation: '5', response: '10,000', debate: '100,000' })
  })

  it('is unavailable while disabled', async () => {
    await configureSite({ enabled: false })

    const res = await listPetitions(request('GET', '/api/petitions'))
    const body = await res.json()

    expect(res.status).toBe(503)
    expect(res.headers.get('retry-after')).toBe('300')
    expect(body.code).toBe('SERVICE_UNAVAILABLE')
  })

  describe('when protected', () => {
    async function protect() {
      await configureSite({
        protected: true,
        username: 'petitions',
        passwordDigest: bcrypt.hashSync('test-secret', 4),
      })
    }

    it('asks for credentials', async () => {
      await protect()

      const res = await listPetitions(request('GET', '/api/petitions'))

      expect(res.status).toBe(401)
      expect(res.headers.get('www-authenticate')).toBe('Basic realm="Petition parliament"')
    })

    it('rejects wrong credentials', async () => {
      await protect()

      const res = await listPetitions(request('GET', '/api/petitions', undefined, basicAuth('petitions', 'wrong')))

      expect(res.status).toBe(401)
    })

    it('lets the right credentials through', async () => {
      await protect()

      const res = await listPetitions(
        request('GET', '/api/petitions', undefined, basicAuth('petitions', 'test-secret'))
      )

      expect(res.status).toBe(200)
    })
  })
})

describe('site settings', () => {
  it('redirects to the login page when not signed in', async () => {
    const res = await showSettings()
    expect(res.headers.get('location')).toBe(`${BASE_URL}/admin/login`)
  })

  it('is forbidden to moderators', async () => {
    loginAs(await createAdminUser({ role: 'moderator' }))

    const show = await showSettings()
    const update = await updateSettings(request('PATCH', '/api/admin/site', { site: { title: 'Mine now' } }))

    expect(show.status).toBe(403)
    expect(update.status).toBe(403)
  })

  it('shows settings to sysadmins without the password digest', async () => {
    loginAs(await createAdminUser({ role: 'sysadmin' }))

    const res = await showSettings()
    const body = await res.json()

    expect(res.status).toBe(200)
    expect(body.site.url).toBe(BASE_URL)
    expect(body.site.passwordDigest).toBeUndefined()
    expect(body.site.passwordSet).toBe(false)
  })

  it('updates only the given settings', async () => {
    loginAs(await createAdminUser({ role: 'sysadmin' }))

    const res = await updateSettings(
      request('PATCH', '/api/admin/site', { site: { title: 'Local petitions', thresholdForDebate: '50' } })
    )
    const body = await res.json()

    expect(res.status).toBe(200)
    expect(body.site.title).toBe('Local petitions')
    expect(body.site.thresholdForDebate).toBe(50)
    expect(body.site.thresholdForResponse).toBe(10000)

    const site = await (await showSite(request('GET', '/api/site'))).json()
    expect(site.title).toBe('Local petitions')
    expect(site.thresholds.debate).toBe('50')
  })

  it('reports invalid settings', async () => {
    loginAs(await createAdminUser({ role: 'sysadmin' }))

    const res = await updateSettings(request('PATCH', '/api/admin/site', { site: { thresholdForDebate: 'lots' } }))
    const body = await res.json()

    expect(res.status).toBe(422)
    expect(body.errors).toEqual({ thresholdForDebate: ['is not a number'] })
  })
})

describe('profile', () => {
  const change = {
    user: { currentPassword: 'Letmein1!', password: 'Newpass2$', passwordConfirmation: 'Newpass2$' },
  }

  it('lets a user with a forced reset change their password', async () => {
    const user = await createAdminUser({ password: 'Letmein1!', forcePasswordReset: true })
    loginAs(user)

    const shown = await showProfile(request('GET', `/api/admin/profile/${user.id}`), routeParams(user.id))
    expect(shown.status).toBe(200)

    const res = await updateProfile(request('PATCH', `/api/admin/profile/${user.id}`, change), routeParams(user.id))
    const body = await res.json()

    expect(res.status).toBe(200)
    expect(body.user.forcePasswordReset).toBe(false)

    const index = await listAdminPetitions(request('GET', '/api/admin/petitions'))
    expect(index.status).toBe(200)
  })

  it("is forbidden for someone else's profile", async () => {
    const user = await createAdminUser()
    const other = await createAdminUser()
    loginAs(user)

    const res = await updateProfile(request('PATCH', `/api/admin/profile/${other.id}`, change), routeParams(other.id))

    expect(res.status).toBe(403)
  })

  it('reports a wrong current password', async () => {
    const user = await createAdminUser({ password: 'Letmein1!' })
    loginAs(user)

    const res = await updateProfile(
      request('PATCH', `/api/admin/profile/${user.id}`, { user: { ...change.user, currentPassword: 'nope' } }),
      routeParams(user.id)
    )
    const body = await res.json()

    expect(res.status).toBe(422)
    expect(body.errors).toEqual({ currentPassword: ['is incorrect'] })
  })
})
