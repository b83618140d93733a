import { db } from './db'
import { getSite } from './site'
import { enqueue, type JobHandlers, type JobPayloads } from './jobs'
import { sendEmail } from './email'
import { thresholdResponseEmail } from './email-templates'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

function readTimestamp(value: unknown): string {
  if (typeof value !== 'string' || Number.isNaN(Date.parse(value))) {
    throw new Error('Job payload has no valid requestedAt')
  }
  return value
}

function readId(value: unknown, field: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new Error(`Job payload has no valid ${field}`)
  }
  return value
}

export function parseEmailThresholdResponse(payload: unknown): JobPayloads['EmailThresholdResponse'] {
  if (!isRecord(payload)) throw new Error('Job payload is not an object')
  return {
    petitionId: readId(payload.petitionId, 'petitionId'),
    requestedAt: readTimestamp(payload.requestedAt),
  }
}

export function parseDeliverThresholdResponseEmail(payload: unknown): JobPayloads['DeliverThresholdResponseEmail'] {
  if (!isRecord(payload)) throw new Error('Job payload is not an object')
  return {
    petitionId: readId(payload.petitionId, 'petitionId'),
    signatureId: readId(payload.signatureId, 'signatureId'),
    requestedAt: readTimestamp(payload.requestedAt),
  }
}

/**
 * Fan out one delivery job per validated, opted-in signature that has not
 * been emailed for this request yet.
 */
export async function emailThresholdResponse(payload: unknown): Promise<void> {
  const { petitionId, requestedAt } = parseEmailThresholdResponse(payload)
  const petition = await db.petitions.findById(petitionId)
  if (!petition) {
    console.warn(`[notifications] Petition ${petitionId} no longer exists, skipping response emails`)
    return
  }

  const signatures = await db.signatures.findMany({
    petitionId,
    state: 'validated',
    notifyByEmail: true,
    emailNotSent: { name: 'government_response', before: new Date(requestedAt) },
  })

  for (const signature of signatures) {
    await enqueue('DeliverThresholdResponseEmail', { petitionId, signatureId: signature.id, requestedAt })
  }

  console.log(`[notifications] Queued ${signatures.length} response emails for petition ${petitionId}`)
}

/**
 * Email one signer and stamp the sent receipt with the request timestamp.
 * A signer already stamped for this request is skipped.
 */
export async function deliverThresholdResponseEmail(payload: unknown): Promise<void> {
  const { petitionId, signatureId, requestedAt } = parseDeliverThresholdResponseEmail(payload)
  const requested = new Date(requestedAt)

  const [petition, signature] = await Promise.all([
    db.petitions.findById(petitionId),
    db.signatures.findById(signatureId),
  ])
  if (!petition || !signature || !signature.notifyByEmail) return

  const sentAt = await db.signatures.getEmailSentAt(signatureId, 'government_response')
  if (sentAt && sentAt.getTime() >= requested.getTime()) return

  const site = await getSite()
  const sent = await sendEmail({
    from: site.emailFrom,
    to: signature.email,
    ...thresholdResponseEmail({ site, petition, signature }),
  })
  if (!sent) {
    throw new Error(`Could not deliver response email to signature ${signatureId}`)
  }

  await db.signatures.setEmailSentAt(signatureId, 'government_response', requested)
}

export const jobHandlers: JobHandlers = {
  EmailThresholdResponse: emailThresholdResponse,
  DeliverThresholdResponseEmail: deliverThresholdResponseEmail,
}
