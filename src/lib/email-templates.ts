import type { Petition, Signature } from '@/types/models'
import type { Site } from './site'
import { formatDelimited } from './format'

export interface EmailContent {
  subject: string
  html: string
  text: string
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;')
}

const layout = (site: Site, content: string) => `
<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
</head>
<body style="margin:0;padding:0;background:#f3f2f1;font-family:Arial,sans-serif;">
  <div style="max-width:560px;margin:0 auto;padding:32px 16px;">
    <div style="padding:16px 0;">
      <a href="${site.url}" style="text-decoration:none;font-size:20px;font-weight:700;color:#0b0c0c;">${escapeHtml(site.title)}</a>
    </div>
    <div style="background:#ffffff;padding:24px;border-top:4px solid #1d70b8;">
      ${content}
    </div>
    <div style="padding:16px 0;">
      <p style="color:#505a5f;font-size:12px;margin:0;">
        Questions? Contact ${escapeHtml(site.feedbackEmail)}
      </p>
    </div>
  </div>
</body>
</html>
`

const button = (href: string, label: string) =>
  `<a href="${href}" style="display:inline-block;background:#00703c;color:#fff;text-decoration:none;padding:10px 20px;font-weight:600;font-size:15px;margin:16px 0;">${label}</a>`

const quote = (text: string) =>
  `<p style="margin:16px 0;padding-left:12px;border-left:4px solid #b1b4b6;color:#0b0c0c;font-size:16px;">${escapeHtml(text)}</p>`

export function petitionUrl(site: Site, petition: Pick<Petition, 'id'>): string {
  return `${site.url}/petitions/${petition.id}`
}

export function verifyUrl(site: Site, signature: Pick<Signature, 'id' | 'perishableToken'>): string {
  return `${site.url}/signatures/${signature.id}/verify?token=${encodeURIComponent(signature.perishableToken)}`
}

export function unsubscribeUrl(site: Site, signature: Pick<Signature, 'id' | 'perishableToken'>): string {
  return `${site.url}/signatures/${signature.id}/unsubscribe?token=${encodeURIComponent(signature.perishableToken)}`
}

export function confirmSignatureEmail(params: {
  site: Site
  petition: Petition
  signature: Signature
  creator: boolean
}): EmailContent {
  const { site, petition, signature } = params
  const link = verifyUrl(site, signature)
  const subject = params.creator
    ? 'Please confirm your email address'
    : signature.sponsor
      ? `Please confirm your support for the petition '${petition.action}'`
      : `Please confirm your signature on the petition '${petition.action}'`

  return {
    subject,
    html: layout(site, `
      <p style="margin:0 0 8px;">Dear ${escapeHtml(signature.name)},</p>
      <p style="margin:0 0 8px;">Click the link below to confirm your email address for the petition:</p>
      ${quote(petition.action)}
      ${button(link, 'Confirm your email address')}
      <p style="color:#505a5f;font-size:12px;">Or copy this link: ${link}</p>
    `),
    text: [
      `Dear ${signature.name},`,
      '',
      `Click this link to confirm your email address for the petition "${petition.action}":`,
      link,
    ].join('\n'),
  }
}

export function thresholdResponseEmail(params: {
  site: Site
  petition: Petition
  signature: Signature
}): EmailContent {
  const { site, petition, signature } = params
  const count = formatDelimited(petition.signatureCount)
  const link = petitionUrl(site, petition)
  const unsubscribe = unsubscribeUrl(site, signature)

  return {
    subject: `The petition '${petition.action}' has reached ${count} signatures`,
    html: layout(site, `
      <p style="margin:0 0 8px;">Dear ${escapeHtml(signature.name)},</p>
      <p style="margin:0 0 8px;">You signed the petition:</p>
      ${quote(petition.action)}
      <p style="margin:0 0 8px;">It has reached ${count} signatures and the government has responded:</p>
      ${petition.responseSummary ? quote(petition.responseSummary) : ''}
      <p style="margin:0 0 8px;white-space:pre-line;">${escapeHtml(petition.response ?? '')}</p>
      ${button(link, 'View the petition')}
      <p style="color:#505a5f;font-size:12px;">
        <a href="${unsubscribe}" style="color:#1d70b8;">Stop receiving emails about this petition</a>
      </p>
    `),
    text: [
      `Dear ${signature.name},`,
      '',
      `You signed the petition "${petition.action}".`,
      `It has reached ${count} signatures and the government has responded:`,
      '',
      petition.responseSummary ?? '',
      '',
      petition.response ?? '',
      '',
      `View the petition: ${link}`,
      `Unsubscribe: ${unsubscribe}`,
    ].join('\n'),
  }
}

export function petitionPublishedEmail(params: {
  site: Site
  petition: Petition
  signature: Signature
}): EmailContent {
  const { site, petition, signature } = params
  const link = petitionUrl(site, petition)

  return {
    subject: `We published your petition '${petition.action}'`,
    html: layout(site, `
      <p style="margin:0 0 8px;">Dear ${escapeHtml(signature.name)},</p>
      <p style="margin:0 0 8px;">Your petition has been checked and published:</p>
      ${quote(petition.action)}
      <p style="margin:0 0 8px;">
        The government responds to petitions that get ${site.formattedThresholdForResponse} signatures.
        Petitions with ${site.formattedThresholdForDebate} signatures are considered for debate.
      </p>
      ${button(link, 'Share your petition')}
    `),
    text: [
      `Dear ${signature.name},`,
      '',
      `Your petition "${petition.action}" has been checked and published.`,
      `The government responds to petitions that get ${site.formattedThresholdForResponse} signatures.`,
      `Petitions with ${site.formattedThresholdForDebate} signatures are considered for debate.`,
      '',
      link,
    ].join('\n'),
  }
}

export function petitionRejectedEmail(params: {
  site: Site
  petition: Petition
  signature: Signature
  reason: string
}): EmailContent {
  const { site, petition, signature, reason } = params

  return {
    subject: `We rejected your petition '${petition.action}'`,
    html: layout(site, `
      <p style="margin:0 0 8px;">Dear ${escapeHtml(signature.name)},</p>
      <p style="margin:0 0 8px;">Sorry, we can't accept your petition:</p>
      ${quote(petition.action)}
      <p style="margin:0 0 8px;">${escapeHtml(reason)}</p>
      ${petition.rejectionDetails ? `<p style="margin:0 0 8px;white-space:pre-line;">${escapeHtml(petition.rejectionDetails)}</p>` : ''}
    `),
    text: [
      `Dear ${signature.name},`,
      '',
      `Sorry, we can't accept your petition "${petition.action}".`,
      '',
      reason,
      ...(petition.rejectionDetails ? ['', petition.rejectionDetails] : []),
    ].join('\n'),
  }
}
