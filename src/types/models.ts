export const PETITION_STATES = [
  'pending',
  'validated',
  'sponsored',
  'open',
  'closed',
  'rejected',
  'hidden',
] as const

export type PetitionState = (typeof PETITION_STATES)[number]

export const EMAIL_RECEIPT_NAMES = [
  'government_response',
  'debate_outcome',
  'debate_scheduled',
  'petition_email',
] as const

export type EmailReceiptName = (typeof EMAIL_RECEIPT_NAMES)[number]

export interface SiteAttributes {
  title: string
  url: string
  emailFrom: string
  feedbackEmail: string
  username: string | null
  passwordDigest: string | null
  enabled: boolean
  protected: boolean
  petitionDuration: number
  minimumNumberOfSponsors: number
  maximumNumberOfSponsors: number
  thresholdForModeration: number
  thresholdForResponse: number
  thresholdForDebate: number
}

export interface SiteRecord extends SiteAttributes {
  id: number
  createdAt: Date
  updatedAt: Date
}

export interface Petition {
  id: number
  action: string
  background: string
  additionalDetails: string | null
  state: PetitionState
  signatureCount: number
  creatorSignatureId: number | null
  sponsorToken: string
  openedAt: Date | null
  closedAt: Date | null
  rejectionCode: string | null
  rejectionDetails: string | null
  response: string | null
  responseSummary: string | null
  /** Calendar date, `YYYY-MM-DD` */
  scheduledDebateDate: string | null
  moderationThresholdReachedAt: Date | null
  responseThresholdReachedAt: Date | null
  debateThresholdReachedAt: Date | null
  createdAt: Date
  updatedAt: Date
}

export type NewPetition = Pick<Petition, 'action' | 'background' | 'additionalDetails' | 'sponsorToken'> &
  Partial<Pick<Petition, 'state'>>

export type PetitionChanges = Partial<Omit<Petition, 'id' | 'createdAt' | 'updatedAt'>>

export type PetitionOrder = 'newest' | 'signatureCount' | 'mostSigned'

export interface PetitionQuery {
  states?: readonly PetitionState[]
  minSignatureCount?: number
  search?: string
  openedBefore?: Date
  order?: PetitionOrder
  limit?: number
  offset?: number
}

export type SignatureState = 'pending' | 'validated'

export interface Signature {
  id: number
  petitionId: number
  name: string
  email: string
  postcode: string | null
  location: string
  ukCitizenship: boolean
  notifyByEmail: boolean
  state: SignatureState
  perishableToken: string
  sponsor: boolean
  validatedAt: Date | null
  createdAt: Date
  updatedAt: Date
}

export type NewSignature = Pick<
  Signature,
  'petitionId' | 'name' | 'email' | 'postcode' | 'location' | 'ukCitizenship' | 'notifyByEmail' | 'perishableToken' | 'sponsor'
>

export type SignatureChanges = Partial<Pick<Signature, 'state' | 'validatedAt' | 'notifyByEmail'>>

export interface SignatureQuery {
  petitionId: number
  state?: SignatureState
  notifyByEmail?: boolean
  sponsor?: boolean
  /** Only signatures whose sent receipt is empty or older than `before` */
  emailNotSent?: { name: EmailReceiptName; before: Date }
}

export type AdminRole = 'sysadmin' | 'moderator'

export interface AdminUser {
  id: number
  email: string
  firstName: string
  lastName: string
  role: AdminRole
  passwordDigest: string
  forcePasswordReset: boolean
  passwordChangedAt: Date | null
  failedLoginCount: number
  lastLoginAt: Date | null
  createdAt: Date
  updatedAt: Date
}

export type NewAdminUser = Pick<AdminUser, 'email' | 'firstName' | 'lastName' | 'role' | 'passwordDigest'> &
  Partial<Pick<AdminUser, 'forcePasswordReset' | 'passwordChangedAt'>>

export type AdminUserChanges = Partial<
  Pick<AdminUser, 'passwordDigest' | 'forcePasswordReset' | 'passwordChangedAt' | 'failedLoginCount' | 'lastLoginAt'>
>

export type JobStatus = 'pending' | 'running' | 'completed' | 'failed'

export interface JobRecord {
  id: number
  name: string
  payload: unknown
  status: JobStatus
  attempts: number
  lastError: string | null
  runAt: Date
  completedAt: Date | null
  createdAt: Date
}

export interface SiteRepository {
  first(): Promise<SiteRecord | null>
  create(attrs: SiteAttributes): Promise<SiteRecord>
  update(id: number, attrs: Partial<SiteAttributes>): Promise<SiteRecord>
}

export interface PetitionRepository {
  create(attrs: NewPetition): Promise<Petition>
  findById(id: number): Promise<Petition | null>
  findMany(query: PetitionQuery): Promise<Petition[]>
  count(query: PetitionQuery): Promise<number>
  update(id: number, changes: PetitionChanges): Promise<Petition>
  /** Atomically adds one to the signature count and returns the new count */
  incrementSignatureCount(id: number): Promise<number>
  getEmailRequestedAt(id: number, name: EmailReceiptName): Promise<Date | null>
  setEmailRequestedAt(id: number, name: EmailReceiptName, time: Date): Promise<void>
}

export interface SignatureRepository {
  create(attrs: NewSignature): Promise<Signature>
  findById(id: number): Promise<Signature | null>
  findByEmail(petitionId: number, email: string): Promise<Signature | null>
  findMany(query: SignatureQuery): Promise<Signature[]>
  count(query: SignatureQuery): Promise<number>
  update(id: number, changes: SignatureChanges): Promise<Signature>
  /** Validates a pending signature; null when it was no longer pending */
  markValidated(id: number, at: Date): Promise<Signature | null>
  getEmailSentAt(id: number, name: EmailReceiptName): Promise<Date | null>
  setEmailSentAt(id: number, name: EmailReceiptName, time: Date): Promise<void>
}

export interface AdminUserRepository {
  create(attrs: NewAdminUser): Promise<AdminUser>
  findById(id: number): Promise<AdminUser | null>
  findByEmail(email: string): Promise<AdminUser | null>
  update(id: number, changes: AdminUserChanges): Promise<AdminUser>
}

export interface JobRepository {
  enqueue(name: string, payload: unknown, runAt: Date): Promise<JobRecord>
  /** Moves up to `limit` runnable jobs to `running` and returns them in id order */
  claimRunnable(now: Date, limit: number): Promise<JobRecord[]>
  markCompleted(id: number, at: Date): Promise<void>
  markFailed(id: number, error: string, retryAt: Date | null): Promise<void>
  findMany(query: { status?: JobStatus; name?: string }): Promise<JobRecord[]>
}

export interface Database {
  sites: SiteRepository
  petitions: PetitionRepository
  signatures: SignatureRepository
  adminUsers: AdminUserRepository
  jobs: JobRepository
}
