import { getServerSession } from 'next-auth'
import { authOptions } from './auth'

export interface AdminSession {
  email: string
}

/**
 * The signed-in moderation user's identity, from the next-auth JWT session.
 */
export async function getAdminSession(): Promise<AdminSession | null> {
  const session = await getServerSession(authOptions)
  const email = session?.user?.email
  return email ? { email } : null
}
