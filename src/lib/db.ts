import { Pool } from 'pg'
import type { Database } from '@/types/models'
import { createSiteRepository } from './repositories/sites'
import { createPetitionRepository } from './repositories/petitions'
import { createSignatureRepository } from './repositories/signatures'
import { createAdminUserRepository } from './repositories/admin-users'
import { createJobRepository } from './repositories/jobs'

const globalForDb = globalThis as unknown as {
  db: Database | undefined
  pool: Pool | undefined
}

function createDatabase(): Database {
  const pool = globalForDb.pool ?? new Pool({
    connectionString: process.env.DATABASE_URL,
    max: 5,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
  })

  if (!globalForDb.pool) {
    globalForDb.pool = pool
  }

  pool.on('error', (error) => {
    console.error('[db] Idle client error:', error.message)
  })

  return {
    sites: createSiteRepository(pool),
    petitions: createPetitionRepository(pool),
    signatures: createSignatureRepository(pool),
    adminUsers: createAdminUserRepository(pool),
    jobs: createJobRepository(pool),
  }
}

export const db = globalForDb.db ?? createDatabase()

// Reuse across hot reloads and warm invocations
globalForDb.db = db

export default db
