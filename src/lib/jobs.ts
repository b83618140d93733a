import { db } from './db'
import type { JobRecord } from '@/types/models'

export interface JobPayloads {
  EmailThresholdResponse: { petitionId: number; requestedAt: string }
  DeliverThresholdResponseEmail: { petitionId: number; signatureId: number; requestedAt: string }
}

export type JobName = keyof JobPayloads

export type JobHandlers = {
  [N in JobName]: (payload: unknown) => Promise<void>
}

export const MAX_ATTEMPTS = 5
const BATCH_SIZE = 50

export async function enqueue<N extends JobName>(name: N, payload: JobPayloads[N], runAt = new Date()): Promise<JobRecord> {
  const job = await db.jobs.enqueue(name, payload, runAt)
  console.log(`[jobs] Enqueued ${name} #${job.id}`)
  return job
}

/** Seconds to wait before the next attempt, growing with each failure */
export function retryDelaySeconds(attempts: number): number {
  return attempts ** 4 + 5
}

function isJobName(name: string, handlers: JobHandlers): name is JobName {
  return Object.prototype.hasOwnProperty.call(handlers, name)
}

async function perform(job: JobRecord, handlers: JobHandlers, now: () => Date): Promise<boolean> {
  if (!isJobName(job.name, handlers)) {
    console.error(`[jobs] Unknown job ${job.name} #${job.id}`)
    await db.jobs.markFailed(job.id, `Unknown job: ${job.name}`, null)
    return false
  }

  try {
    await handlers[job.name](job.payload)
    await db.jobs.markCompleted(job.id, now())
    return true
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    const attempts = job.attempts + 1
    const retryAt = attempts < MAX_ATTEMPTS
      ? new Date(now().getTime() + retryDelaySeconds(attempts) * 1000)
      : null

    console.error(`[jobs] ${job.name} #${job.id} failed (attempt ${attempts}/${MAX_ATTEMPTS}):`, message)
    await db.jobs.markFailed(job.id, message, retryAt)
    return false
  }
}

/**
 * Run every runnable job in id order until none remain. Jobs enqueued while
 * draining are picked up in the next round; retried jobs wait for their
 * backoff. Each batch is claimed first, so overlapping drains never run the
 * same job.
 */
export async function performPendingJobs(
  handlers: JobHandlers,
  now: () => Date = () => new Date()
): Promise<{ performed: number; failed: number }> {
  let performed = 0
  let failed = 0

  for (;;) {
    const jobs = await db.jobs.claimRunnable(now(), BATCH_SIZE)
    if (jobs.length === 0) break

    for (const job of jobs) {
      if (await perform(job, handlers, now)) {
        performed++
      } else {
        failed++
      }
    }
  }

  if (performed + failed > 0) {
    console.log(`[jobs] Performed ${performed}, failed ${failed}`)
  }

  return { performed, failed }
}
