import crypto from 'crypto'
import { db } from './db'
import { getSite } from './site'
import { sendEmail } from './email'
import { confirmSignatureEmail } from './email-templates'
import { InvalidTransition, RecordNotFound } from './errors'
import { Validator } from './validation'
import { booleanParam, stringParam, type Params } from './http'
import type { Petition, PetitionChanges, PetitionState, Signature } from '@/types/models'

export interface SignatureInput {
  name?: string
  email?: string
  postcode?: string
  location?: string
  ukCitizenship?: boolean
  notifyByEmail?: boolean
}

const SPONSORABLE_STATES: readonly PetitionState[] = ['pending', 'validated', 'sponsored']

export function generateToken(): string {
  return crypto.randomBytes(16).toString('hex')
}

export function normalizePostcode(postcode: string): string {
  return postcode.replace(/\s+/g, '').toUpperCase()
}

/**
 * Field rules shared by petition creators, sponsors and signers.
 * `prefix` namespaces the error keys, e.g. `creator.email`.
 */
export function validateSignatureInput(input: SignatureInput, v = new Validator(), prefix = ''): Validator {
  const key = (field: string) => `${prefix}${field}`

  if (v.presence(key('name'), input.name)) v.maxLength(key('name'), input.name, 255)
  v.email(key('email'), input.email)
  v.presence(key('location'), input.location)
  if (input.location === 'GB') {
    if (v.presence(key('postcode'), input.postcode) && input.postcode) {
      v.maxLength(key('postcode'), normalizePostcode(input.postcode), 10)
    }
  }
  if (input.ukCitizenship !== true) {
    v.add(key('ukCitizenship'), 'must be accepted')
  }

  return v
}

export function buildSignature(petitionId: number, input: SignatureInput, sponsor: boolean) {
  return {
    petitionId,
    name: (input.name ?? '').trim(),
    email: (input.email ?? '').trim(),
    postcode: input.postcode ? normalizePostcode(input.postcode) : null,
    location: input.location ?? '',
    ukCitizenship: input.ukCitizenship === true,
    notifyByEmail: input.notifyByEmail === true,
    perishableToken: generateToken(),
    sponsor,
  }
}

export async function sendConfirmation(petition: Petition, signature: Signature): Promise<boolean> {
  const site = await getSite()
  const content = confirmSignatureEmail({
    site,
    petition,
    signature,
    creator: petition.creatorSignatureId === signature.id,
  })
  return sendEmail({ from: site.emailFrom, to: signature.email, ...content })
}

async function createSignature(petition: Petition, input: SignatureInput, sponsor: boolean): Promise<Signature> {
  const v = validateSignatureInput(input)
  if (input.email && (await db.signatures.findByEmail(petition.id, input.email.trim()))) {
    v.add('email', 'has already signed this petition')
  }
  v.assertValid()

  const signature = await db.signatures.create(buildSignature(petition.id, input, sponsor))

  try {
    await sendConfirmation(petition, signature)
  } catch (err) {
    console.error('[signatures] Failed to send confirmation email:', err)
  }

  return signature
}

/**
 * Add a pending signature to an open petition and email its confirmation link.
 */
export async function signPetition(petitionId: number, input: SignatureInput): Promise<Signature> {
  const petition = await db.petitions.findById(petitionId)
  if (!petition) throw new RecordNotFound('Petition not found')
  if (petition.state !== 'open') {
    throw new InvalidTransition('This petition is not open for signatures')
  }

  return createSignature(petition, input, false)
}

/**
 * Add a pending sponsor signature to a petition still gathering support.
 */
export async function sponsorPetition(petitionId: number, token: string, input: SignatureInput): Promise<Signature> {
  const petition = await db.petitions.findById(petitionId)
  if (!petition || petition.sponsorToken !== token) throw new RecordNotFound('Petition not found')
  if (!SPONSORABLE_STATES.includes(petition.state)) {
    throw new InvalidTransition('This petition is no longer gathering sponsors')
  }

  const site = await getSite()
  const sponsors = await db.signatures.count({ petitionId, sponsor: true })
  if (sponsors >= site.maximumNumberOfSponsors) {
    throw new InvalidTransition('This petition has already reached the maximum number of sponsors')
  }

  return createSignature(petition, input, true)
}

async function findWithToken(id: number, token: string): Promise<Signature> {
  const signature = await db.signatures.findById(id)
  if (!signature || !token || signature.perishableToken !== token) {
    throw new RecordNotFound('Signature not found')
  }
  return signature
}

export interface VerificationResult {
  signature: Signature
  petition: Petition
  alreadyValidated: boolean
}

/**
 * Confirm a signature's email address. Counts the signature and moves the
 * petition through creator validation, sponsorship and the response and
 * debate thresholds.
 */
export async function verifySignature(id: number, token: string, now = new Date()): Promise<VerificationResult> {
  const pending = await findWithToken(id, token)
  const current = await db.petitions.findById(pending.petitionId)
  if (!current) throw new RecordNotFound('Petition not found')

  if (pending.state === 'validated') {
    return { signature: pending, petition: current, alreadyValidated: true }
  }

  const signature = await db.signatures.markValidated(id, now)
  if (!signature) {
    // Validated by a concurrent request
    const latest = await findWithToken(id, token)
    const petition = await db.petitions.findById(latest.petitionId)
    return { signature: latest, petition: petition ?? current, alreadyValidated: true }
  }

  const count = await db.petitions.incrementSignatureCount(current.id)
  const site = await getSite()

  const changes: PetitionChanges = {}
  let state = current.state

  if (state === 'pending' && current.creatorSignatureId === signature.id) {
    state = 'validated'
  }

  if (state === 'validated') {
    const sponsors = await db.signatures.count({ petitionId: current.id, sponsor: true, state: 'validated' })
    if (sponsors >= site.thresholdForModeration) {
      state = 'sponsored'
      changes.moderationThresholdReachedAt = now
      console.log(`[signatures] Petition ${current.id} reached the moderation threshold`)
    }
  }

  if (state !== current.state) changes.state = state

  if (current.state === 'open') {
    if (count >= site.thresholdForResponse && !current.responseThresholdReachedAt) {
      changes.responseThresholdReachedAt = now
    }
    if (count >= site.thresholdForDebate && !current.debateThresholdReachedAt) {
      changes.debateThresholdReachedAt = now
    }
  }

  const petition = Object.keys(changes).length > 0
    ? await db.petitions.update(current.id, changes)
    : { ...current, signatureCount: count }

  return { signature, petition, alreadyValidated: false }
}

export async function unsubscribeSignature(id: number, token: string): Promise<Signature> {
  const signature = await findWithToken(id, token)
  if (!signature.notifyByEmail) return signature
  return db.signatures.update(id, { notifyByEmail: false })
}

export function signatureInputFrom(params: Params): SignatureInput {
  return {
    name: stringParam(params, 'name'),
    email: stringParam(params, 'email'),
    postcode: stringParam(params, 'postcode'),
    location: stringParam(params, 'location'),
    ukCitizenship: booleanParam(params, 'ukCitizenship'),
    notifyByEmail: booleanParam(params, 'notifyByEmail'),
  }
}
