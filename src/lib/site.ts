import bcrypt from 'bcryptjs'
import { db } from './db'
import { cached, invalidateKey } from './cache'
import { addMonths, endOfDay, formatDelimited } from './format'
import { Validator } from './validation'
import type { SiteAttributes, SiteRecord } from '@/types/models'

export const SITE_CACHE_KEY = '__site__'
const SITE_CACHE_TTL = 5 * 60 * 1000 // 5 minutes

const BCRYPT_COST = 10

type Env = Record<string, string | undefined>

export interface HostConstraints {
  protocol: string
  host: string
  port: number
}

// Lenient string-to-integer: leading digits or 0
function toInteger(value: string): number {
  const parsed = Number.parseInt(value, 10)
  return Number.isNaN(parsed) ? 0 : parsed
}

function presence(value: string | undefined): string | null {
  return value && value.trim() !== '' ? value : null
}

function isAbsoluteUrl(value: string): boolean {
  try {
    return /^https?:$/.test(new URL(value).protocol)
  } catch {
    return false
  }
}

function defaultPortFor(scheme: string): number {
  return scheme === 'https' ? 443 : 80
}

/**
 * Site settings derived from the environment, used when no row exists yet.
 * `SITE_PASSWORD` is hashed separately when the row is created.
 */
export function siteDefaults(env: Env = process.env): SiteAttributes {
  const protocol = env.EPETITIONS_PROTOCOL ?? 'https'
  const scheme = protocol === 'https' ? 'https' : 'http'
  const host = env.EPETITIONS_HOST ?? 'petition.parliament.uk'
  const port = toInteger(env.EPETITIONS_PORT ?? '443')
  const url = port === defaultPortFor(scheme) ? `${scheme}://${host}` : `${scheme}://${host}:${port}`

  return {
    title: env.SITE_TITLE ?? 'Petition parliament',
    url,
    emailFrom: env.EPETITIONS_FROM ?? `"Petitions: UK Government and Parliament" <no-reply@${host}>`,
    feedbackEmail: env.EPETITIONS_FEEDBACK ?? `"Petitions: UK Government and Parliament" <feedback@${host}>`,
    username: presence(env.SITE_USERNAME),
    passwordDigest: null,
    enabled: toInteger(env.SITE_ENABLED ?? '1') !== 0,
    protected: toInteger(env.SITE_PROTECTED ?? '0') !== 0,
    petitionDuration: toInteger(env.PETITION_DURATION ?? '6'),
    minimumNumberOfSponsors: toInteger(env.MINIMUM_NUMBER_OF_SPONSORS ?? '5'),
    maximumNumberOfSponsors: toInteger(env.MAXIMUM_NUMBER_OF_SPONSORS ?? '20'),
    thresholdForModeration: toInteger(env.THRESHOLD_FOR_MODERATION ?? '5'),
    thresholdForResponse: toInteger(env.THRESHOLD_FOR_RESPONSE ?? '10000'),
    thresholdForDebate: toInteger(env.THRESHOLD_FOR_DEBATE ?? '100000'),
  }
}

export class Site {
  private readonly uri: URL

  constructor(readonly record: SiteRecord) {
    this.uri = new URL(record.url)
  }

  get title() { return this.record.title }
  get url() { return this.record.url }
  get emailFrom() { return this.record.emailFrom }
  get feedbackEmail() { return this.record.feedbackEmail }
  get username() { return this.record.username }
  get enabled() { return this.record.enabled }
  get protected() { return this.record.protected }
  get petitionDuration() { return this.record.petitionDuration }
  get minimumNumberOfSponsors() { return this.record.minimumNumberOfSponsors }
  get maximumNumberOfSponsors() { return this.record.maximumNumberOfSponsors }
  get thresholdForModeration() { return this.record.thresholdForModeration }
  get thresholdForResponse() { return this.record.thresholdForResponse }
  get thresholdForDebate() { return this.record.thresholdForDebate }

  async authenticate(username: string, password: string): Promise<boolean> {
    const digest = this.record.passwordDigest
    if (!digest || this.username === null || this.username !== username) return false
    return bcrypt.compare(password, digest)
  }

  /** URL scheme without separator, e.g. `https` */
  get emailProtocol(): string {
    return this.uri.protocol.replace(/:$/, '')
  }

  get host(): string {
    return this.uri.hostname
  }

  get port(): number {
    return this.uri.port ? Number(this.uri.port) : defaultPortFor(this.emailProtocol)
  }

  get hostWithPort(): string {
    return `${this.host}${this.portString}`
  }

  get constraintsForPublic(): HostConstraints {
    return { protocol: this.protocol, host: this.host, port: this.port }
  }

  get moderateHost(): string {
    return process.env.NODE_ENV === 'development' ? this.host : `moderate.${this.host}`
  }

  get moderateHostWithPort(): string {
    return `moderate.${this.host}${this.portString}`
  }

  get constraintsForModeration(): HostConstraints {
    return { protocol: this.protocol, host: this.moderateHost, port: this.port }
  }

  get formattedThresholdForModeration(): string {
    return formatDelimited(this.thresholdForModeration)
  }

  get formattedThresholdForResponse(): string {
    return formatDelimited(this.thresholdForResponse)
  }

  get formattedThresholdForDebate(): string {
    return formatDelimited(this.thresholdForDebate)
  }

  /** Petitions opened at or before this moment are due to close. */
  openedAtForClosing(time: Date = new Date()): Date {
    return addMonths(endOfDay(time), -this.petitionDuration)
  }

  closedAtForOpening(time: Date = new Date()): Date {
    return addMonths(endOfDay(time), this.petitionDuration)
  }

  private get protocol(): string {
    return `${this.emailProtocol}://`
  }

  private get standardPort(): number {
    return this.protocol === 'https://' ? 443 : 80
  }

  private get portString(): string {
    return this.port === this.standardPort ? '' : `:${this.port}`
  }
}

async function loadSite(): Promise<Site> {
  const existing = await db.sites.first()
  if (existing) return new Site(existing)

  console.log('[site] No site settings found, creating from environment defaults')
  const password = presence(process.env.SITE_PASSWORD)
  const attrs = siteDefaults()
  attrs.passwordDigest = password ? await bcrypt.hash(password, BCRYPT_COST) : null
  return new Site(await db.sites.create(attrs))
}

/**
 * The site settings singleton, cached for five minutes.
 */
export function getSite(): Promise<Site> {
  return cached(SITE_CACHE_KEY, SITE_CACHE_TTL, loadSite)
}

export function resetSite() {
  invalidateKey(SITE_CACHE_KEY)
}

export type SiteUpdate = Partial<Omit<SiteAttributes, 'passwordDigest'>> & {
  password?: string | null
  passwordConfirmation?: string | null
}

/**
 * Validation rules for a full set of settings. `password` is the new plain
 * text password when one is being set.
 */
export function validateSite(
  attrs: SiteAttributes,
  password?: { value: string | null; confirmation?: string | null }
): Validator {
  const v = new Validator()

  if (v.presence('title', attrs.title)) v.maxLength('title', attrs.title, 50)
  if (v.presence('url', attrs.url)) {
    v.maxLength('url', attrs.url, 50)
    if (!isAbsoluteUrl(attrs.url)) v.add('url', 'is invalid')
  }
  if (v.presence('emailFrom', attrs.emailFrom)) v.maxLength('emailFrom', attrs.emailFrom, 100)
  if (v.presence('feedbackEmail', attrs.feedbackEmail)) v.maxLength('feedbackEmail', attrs.feedbackEmail, 100)

  v.integer('petitionDuration', attrs.petitionDuration)
  v.integer('minimumNumberOfSponsors', attrs.minimumNumberOfSponsors)
  v.integer('maximumNumberOfSponsors', attrs.maximumNumberOfSponsors)
  v.integer('thresholdForModeration', attrs.thresholdForModeration)
  v.integer('thresholdForResponse', attrs.thresholdForResponse)
  v.integer('thresholdForDebate', attrs.thresholdForDebate)

  if (attrs.protected) {
    if (v.presence('username', attrs.username)) v.maxLength('username', attrs.username, 30)

    if (password?.value) {
      v.maxLength('password', password.value, 30)
      if (password.confirmation !== undefined && password.confirmation !== password.value) {
        v.add('passwordConfirmation', "doesn't match Password")
      }
    }
    if (!attrs.passwordDigest) v.add('password', "can't be blank")
  }

  return v
}

/**
 * Validate and persist new settings, then drop the cached instance.
 * A blank password clears the stored digest.
 */
export async function updateSite(changes: SiteUpdate): Promise<Site> {
  const site = await getSite()
  const { password, passwordConfirmation, ...settings } = changes
  const attrs: SiteAttributes = { ...site.record, ...settings }

  let plain: string | null | undefined
  if (password !== undefined) {
    plain = password && password.trim() !== '' ? password : null
    attrs.passwordDigest = plain ? await bcrypt.hash(plain, BCRYPT_COST) : null
  }

  validateSite(attrs, plain === undefined ? undefined : { value: plain, confirmation: passwordConfirmation }).assertValid()

  const record = await db.sites.update(site.record.id, attrs)
  resetSite()

  console.log(`[site] Settings updated for ${record.url}`)
  return new Site(record)
}
