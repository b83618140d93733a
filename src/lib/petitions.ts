import { db } from './db'
import { getSite } from './site'
import { enqueue } from './jobs'
import { sendEmail } from './email'
import { petitionPublishedEmail, petitionRejectedEmail } from './email-templates'
import { InvalidTransition, RecordNotFound, ValidationFailed } from './errors'
import { parseCalendarDate } from './format'
import { Validator } from './validation'
import {
  buildSignature,
  generateToken,
  sendConfirmation,
  validateSignatureInput,
  type SignatureInput,
} from './signatures'
import type { EmailReceiptName, Petition, PetitionQuery, PetitionState, Signature } from '@/types/models'
import { EMAIL_RECEIPT_NAMES, PETITION_STATES } from '@/types/models'

export const SELECTABLE_STATES: readonly PetitionState[] = ['sponsored', 'open', 'closed', 'rejected', 'hidden']
export const VISIBLE_STATES: readonly PetitionState[] = ['open', 'closed', 'rejected']
export const MODERATED_STATES: readonly PetitionState[] = ['open', 'closed']

export const PAGE_SIZE = 50

export const REJECTION_REASONS = {
  duplicate: "There's already a petition about this issue.",
  irrelevant: "It's about something that the Government or House of Commons is not directly responsible for.",
  'no-action': "It did not have a clear statement explaining what action you want the Government or Parliament to take.",
  honours: "It's about honours or appointments.",
  'fake-name': "It did not include your full name, or didn't use your real name.",
  foi: 'It included information that could be requested under the Freedom of Information Act.',
  libellous: 'It included potentially libellous, false, or defamatory statements.',
  offensive: 'It included offensive language, nonsense, a joke, or advertising.',
} as const

export type RejectionCode = keyof typeof REJECTION_REASONS

const HIDDEN_REJECTION_CODES: readonly RejectionCode[] = ['libellous', 'offensive']

export function isRejectionCode(code: string): code is RejectionCode {
  return Object.prototype.hasOwnProperty.call(REJECTION_REASONS, code)
}

export function isPetitionState(state: string): state is PetitionState {
  return PETITION_STATES.some(s => s === state)
}

export interface PetitionInput {
  action?: string
  background?: string
  additionalDetails?: string
  creator?: SignatureInput
}

export interface PetitionPage {
  petitions: Petition[]
  page: number
  total: number
  pageSize: number
}

export async function findPetition(id: number, states?: readonly PetitionState[]): Promise<Petition> {
  const petition = await db.petitions.findById(id)
  if (!petition || (states && !states.includes(petition.state))) {
    throw new RecordNotFound('Petition not found')
  }
  return petition
}

/**
 * Create a pending petition together with its creator's signature.
 */
export async function createPetition(input: PetitionInput): Promise<Petition> {
  const v = new Validator()
  if (v.presence('action', input.action)) v.maxLength('action', input.action, 80)
  if (v.presence('background', input.background)) v.maxLength('background', input.background, 300)
  v.maxLength('additionalDetails', input.additionalDetails, 800)
  validateSignatureInput(input.creator ?? {}, v, 'creator.')
  v.assertValid()

  const created = await db.petitions.create({
    action: (input.action ?? '').trim(),
    background: (input.background ?? '').trim(),
    additionalDetails: input.additionalDetails?.trim() || null,
    sponsorToken: generateToken(),
  })

  const creator = await db.signatures.create(buildSignature(created.id, input.creator ?? {}, false))
  const petition = await db.petitions.update(created.id, { creatorSignatureId: creator.id })
  console.log(`[petitions] Created petition ${petition.id}`)

  try {
    await sendConfirmation(petition, creator)
  } catch (err) {
    console.error('[petitions] Failed to send creator confirmation email:', err)
  }

  return petition
}

async function page(query: PetitionQuery, pageNumber: number): Promise<PetitionPage> {
  const [petitions, total] = await Promise.all([
    db.petitions.findMany({ ...query, limit: PAGE_SIZE, offset: (pageNumber - 1) * PAGE_SIZE }),
    db.petitions.count(query),
  ])
  return { petitions, page: pageNumber, total, pageSize: PAGE_SIZE }
}

function scopeStates(scope: readonly PetitionState[], state: string | null | undefined): readonly PetitionState[] {
  return state && isPetitionState(state) && scope.includes(state) ? [state] : scope
}

export function listVisiblePetitions(options: { state?: string | null; search?: string | null; page?: number }) {
  return page(
    {
      states: scopeStates(VISIBLE_STATES, options.state),
      search: options.search || undefined,
      order: 'mostSigned',
    },
    options.page ?? 1
  )
}

/** Everything moderators can pick from, newest first */
export function listSelectablePetitions(options: { state?: string | null; search?: string | null; page?: number }) {
  return page(
    {
      states: scopeStates(SELECTABLE_STATES, options.state),
      search: options.search || undefined,
      order: 'newest',
    },
    options.page ?? 1
  )
}

/**
 * Open and closed petitions at or above the debate threshold, fewest signatures first.
 */
export async function thresholdPetitions(): Promise<Petition[]> {
  const site = await getSite()
  return db.petitions.findMany({
    states: MODERATED_STATES,
    minSignatureCount: site.thresholdForDebate,
    order: 'signatureCount',
  })
}

export interface ResponseInput {
  response?: string
  responseSummary?: string
  emailSignees?: boolean
}

/**
 * Save the government response. When signers are to be emailed, stamp the
 * petition's receipt and enqueue exactly one notification job.
 */
export async function updateResponse(id: number, input: ResponseInput, now = new Date()): Promise<Petition> {
  const current = await findPetition(id, MODERATED_STATES)

  const v = new Validator()
  v.presence('response', input.response)
  if (v.presence('responseSummary', input.responseSummary)) {
    v.maxLength('responseSummary', input.responseSummary, 500)
  }
  v.assertValid()

  const petition = await db.petitions.update(current.id, {
    response: input.response,
    responseSummary: input.responseSummary,
  })

  if (input.emailSignees) {
    await db.petitions.setEmailRequestedAt(petition.id, 'government_response', now)
    await enqueue('EmailThresholdResponse', { petitionId: petition.id, requestedAt: now.toISOString() })
  }

  return petition
}

export async function updateScheduledDebateDate(id: number, input: string | null | undefined): Promise<Petition> {
  const current = await findPetition(id, MODERATED_STATES)

  let date: string | null = null
  if (input && input.trim() !== '') {
    date = parseCalendarDate(input)
    if (!date) {
      const v = new Validator()
      v.add('scheduledDebateDate', 'is not a valid date')
      v.assertValid()
    }
  }

  return db.petitions.update(current.id, { scheduledDebateDate: date })
}

async function emailCreator(
  petition: Petition,
  send: (creator: Signature) => Promise<boolean>
) {
  if (!petition.creatorSignatureId) return
  const creator = await db.signatures.findById(petition.creatorSignatureId)
  if (!creator) return
  try {
    const sent = await send(creator)
    if (!sent) console.warn(`[petitions] Creator of petition ${petition.id} was not emailed`)
  } catch (err) {
    console.error(`[petitions] Failed to email creator of petition ${petition.id}:`, err)
  }
}

export async function publishPetition(id: number, now = new Date()): Promise<Petition> {
  const current = await findPetition(id)
  if (current.state !== 'sponsored') {
    throw new InvalidTransition('Only petitions awaiting moderation can be published')
  }

  const site = await getSite()
  const petition = await db.petitions.update(id, {
    state: 'open',
    openedAt: now,
    closedAt: site.closedAtForOpening(now),
  })
  console.log(`[petitions] Published petition ${id}`)

  await emailCreator(petition, creator =>
    sendEmail({ from: site.emailFrom, to: creator.email, ...petitionPublishedEmail({ site, petition, signature: creator }) })
  )

  return petition
}

/**
 * Reject with a reason code. Libellous and offensive petitions are hidden
 * from the public rather than listed as rejected.
 */
export async function rejectPetition(id: number, code: string | undefined, details?: string): Promise<Petition> {
  const current = await findPetition(id)
  if (current.state !== 'sponsored') {
    throw new InvalidTransition('Only petitions awaiting moderation can be rejected')
  }

  const rejectionCode = code && isRejectionCode(code) ? code : null
  const v = new Validator()
  if (!rejectionCode) v.add('rejectionCode', code ? 'is not included in the list' : "can't be blank")
  v.maxLength('rejectionDetails', details, 4000)
  if (!rejectionCode || !v.valid) throw new ValidationFailed(v.errors)

  const site = await getSite()
  const petition = await db.petitions.update(id, {
    state: HIDDEN_REJECTION_CODES.includes(rejectionCode) ? 'hidden' : 'rejected',
    rejectionCode,
    rejectionDetails: details?.trim() || null,
  })
  console.log(`[petitions] Rejected petition ${id} (${rejectionCode})`)

  await emailCreator(petition, creator =>
    sendEmail({
      from: site.emailFrom,
      to: creator.email,
      ...petitionRejectedEmail({ site, petition, signature: creator, reason: REJECTION_REASONS[rejectionCode] }),
    })
  )

  return petition
}

/**
 * Close every open petition whose duration has run out.
 */
export async function closeExpiredPetitions(now = new Date()): Promise<number[]> {
  const site = await getSite()
  const expired = await db.petitions.findMany({
    states: ['open'],
    openedBefore: site.openedAtForClosing(now),
    order: 'signatureCount',
  })

  const closed: number[] = []
  for (const petition of expired) {
    try {
      await db.petitions.update(petition.id, { state: 'closed', closedAt: petition.closedAt ?? now })
      closed.push(petition.id)
    } catch (err) {
      console.error(`[petitions] Failed to close petition ${petition.id}:`, err)
    }
  }

  if (closed.length > 0) console.log(`[petitions] Closed ${closed.length} petitions`)
  return closed
}

/** Public representation; tokens and moderation-only fields stay private. */
export function presentPetition(petition: Petition) {
  return {
    id: petition.id,
    action: petition.action,
    background: petition.background,
    additionalDetails: petition.additionalDetails,
    state: petition.state,
    signatureCount: petition.signatureCount,
    openedAt: petition.openedAt,
    closedAt: petition.closedAt,
    response: petition.response,
    responseSummary: petition.responseSummary,
    scheduledDebateDate: petition.scheduledDebateDate,
    rejection: petition.rejectionCode
      ? { code: petition.rejectionCode, details: petition.rejectionDetails }
      : null,
    createdAt: petition.createdAt,
  }
}

export async function presentAdminPetition(petition: Petition) {
  const { sponsorToken: _sponsorToken, ...fields } = petition
  const emailRequestedAt: Partial<Record<EmailReceiptName, Date>> = {}
  for (const name of EMAIL_RECEIPT_NAMES) {
    const at = await db.petitions.getEmailRequestedAt(petition.id, name)
    if (at) emailRequestedAt[name] = at
  }
  return { ...fields, emailRequestedAt }
}
