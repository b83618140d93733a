import { describe, it, expect } from 'vitest'
import { db } from '@/lib/db'
import { GET as listPetitions, POST as startPetition } from '@/app/api/petitions/route'
import { GET as showPetition } from '@/app/api/petitions/[id]/route'
import { GET as closePetitions } from '@/app/api/cron/close-petitions/route'
import { createPetition, request, routeParams } from '../helpers/factories'
import { deliveries } from '../helpers/mailer'

const creator = {
  name: 'Charlie Creator',
  email: 'charlie@example.com',
  postcode: 'SW1A 1AA',
  location: 'GB',
  ukCitizenship: true,
  notifyByEmail: true,
}

function ids(body: { petitions: { id: number }[] }) {
  return body.petitions.map(p => p.id)
}

describe('starting a petition', () => {
  it('creates a pending petition with its creator signature', async () => {
    const res = await startPetition(
      request('POST', '/api/petitions', {
        petition: { action: 'Plant more trees', background: 'Trees are good', creator },
      })
    )
    const body = await res.json()

    expect(res.status).toBe(201)
    expect(body.petition.state).toBe('pending')
    expect(body.petition.signatureCount).toBe(0)

    const petition = await db.petitions.findById(body.petition.id)
    const signatures = await db.signatures.findMany({ petitionId: body.petition.id })
    expect(signatures).toHaveLength(1)
    expect(petition?.creatorSignatureId).toBe(signatures[0].id)
    expect(signatures[0].state).toBe('pending')
    expect(petition?.sponsorToken).toMatch(/^[0-9a-f]{32}$/)

    expect(deliveries).toHaveLength(1)
    expect(deliveries[0].to).toBe('charlie@example.com')
    expect(deliveries[0].subject).toBe('Please confirm your email address')
  })

  it('validates the petition and its creator together', async () => {
    const res = await startPetition(request('POST', '/api/petitions', { petition: { action: '' } }))
    const body = await res.json()

    expect(res.status).toBe(422)
    expect(body.errors).toEqual({
      action: ["can't be blank"],
      background: ["can't be blank"],
      'creator.name': ["can't be blank"],
      'creator.email': ["can't be blank"],
      'creator.location': ["can't be blank"],
      'creator.ukCitizenship': ['must be accepted'],
    })
    expect(await db.petitions.count({})).toBe(0)
  })

  it('limits the length of the action', async () => {
    const res = await startPetition(
      request('POST', '/api/petitions', {
        petition: { action: 'a'.repeat(81), background: 'Trees are good', creator },
      })
    )
    const body = await res.json()

    expect(body.errors).toEqual({ action: ['is too long (maximum is 80 characters)'] })
  })

  it('rejects a body that is not JSON', async () => {
    const req = request('POST', '/api/petitions')
    const res = await startPetition(req)

    expect(res.status).toBe(400)
  })
})

describe('public petitions', () => {
  it('lists open, closed and rejected petitions, most signed first', async () => {
    const open = await createPetition({ state: 'open', signatureCount: 5 })
    const closed = await createPetition({ state: 'closed', signatureCount: 50 })
    const rejected = await createPetition({ state: 'rejected', signatureCount: 1 })
    await createPetition({ state: 'hidden', signatureCount: 100 })
    await createPetition({ state: 'sponsored', signatureCount: 100 })

    const res = await listPetitions(request('GET', '/api/petitions'))
    const body = await res.json()

    expect(ids(body)).toEqual([closed.id, open.id, rejected.id])
    expect(body.total).toBe(3)
    expect(body.page).toBe(1)
  })

  it('ignores a state filter outside the public scope', async () => {
    const open = await createPetition({ state: 'open' })
    await createPetition({ state: 'hidden' })

    const res = await listPetitions(request('GET', '/api/petitions?state=hidden'))

    expect(ids(await res.json())).toEqual([open.id])
  })

  it('searches the action and background', async () => {
    const trees = await createPetition({ action: 'Plant more trees' })
    const roads = await createPetition({ action: 'Fix the roads', background: 'Potholes near the trees' })
    await createPetition({ action: 'Ban fireworks' })

    const res = await listPetitions(request('GET', '/api/petitions?q=TREES'))

    expect(ids(await res.json()).sort((a, b) => a - b)).toEqual([trees.id, roads.id])
  })

  it('shows a visible petition without its sponsor token', async () => {
    const petition = await createPetition({ state: 'open' })

    const res = await showPetition(request('GET', `/api/petitions/${petition.id}`), routeParams(petition.id))
    const body = await res.json()

    expect(res.status).toBe(200)
    expect(body.petition.id).toBe(petition.id)
    expect(body.petition.sponsorToken).toBeUndefined()
  })

  it('hides petitions that are not visible', async () => {
    const hidden = await createPetition({ state: 'hidden' })
    const pending = await createPetition({ state: 'pending' })

    const hiddenRes = await showPetition(request('GET', `/api/petitions/${hidden.id}`), routeParams(hidden.id))
    const pendingRes = await showPetition(request('GET', `/api/petitions/${pending.id}`), routeParams(pending.id))

    expect(hiddenRes.status).toBe(404)
    expect(pendingRes.status).toBe(404)
  })

  it('answers 404 for ids that are not numbers', async () => {
    const res = await showPetition(request('GET', '/api/petitions/abc'), routeParams('abc'))
    expect(res.status).toBe(404)
  })

  it('answers 404 for ids beyond the integer column range', async () => {
    const res = await showPetition(request('GET', '/api/petitions/2147483648'), routeParams('2147483648'))
    const body = await res.json()

    expect(res.status).toBe(404)
    expect(body.code).toBe('NOT_FOUND')
  })
})

describe('closing petitions', () => {
  const cronHeaders = { authorization: 'Bearer test-cron-secret' }

  it('closes open petitions past their duration', async () => {
    const day = 24 * 60 * 60 * 1000
    const expired = await createPetition({ state: 'open', openedAt: new Date(Date.now() - 200 * day) })
    const recent = await createPetition({ state: 'open', openedAt: new Date(Date.now() - 10 * day) })

    const res = await closePetitions(request('GET', '/api/cron/close-petitions', undefined, cronHeaders))
    const body = await res.json()

    expect(body.closed).toEqual([expired.id])
    expect((await db.petitions.findById(expired.id))?.state).toBe('closed')
    expect((await db.petitions.findById(expired.id))?.closedAt).not.toBeNull()
    expect((await db.petitions.findById(recent.id))?.state).toBe('open')
  })

  it('requires the cron secret', async () => {
    const res = await closePetitions(request('GET', '/api/cron/close-petitions'))
    expect(res.status).toBe(401)
  })
})
