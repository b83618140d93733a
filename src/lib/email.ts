import { Resend } from 'resend'

const resend = process.env.RESEND_API_KEY
  ? new Resend(process.env.RESEND_API_KEY)
  : null

export interface EmailMessage {
  from: string
  to: string
  subject: string
  html: string
  text: string
}

/**
 * Send a single email. Never throws: logs the failure and returns false.
 */
export async function sendEmail(message: EmailMessage): Promise<boolean> {
  if (!resend) {
    console.warn('[email] RESEND_API_KEY not configured, skipping email to', message.to)
    return false
  }

  try {
    const { data, error } = await resend.emails.send(message)
    if (error) {
      console.error('[email] Resend error sending to', message.to, 'error:', JSON.stringify(error))
      return false
    }
    console.log('[email] Sent to', message.to, 'id:', data?.id)
    return true
  } catch (error) {
    console.error('[email] Exception sending to', message.to, 'error:', error instanceof Error ? error.message : error)
    return false
  }
}
