import { describe, it, expect, vi } from 'vitest'
import { db } from '@/lib/db'
import { MAX_ATTEMPTS, enqueue, performPendingJobs, retryDelaySeconds, type JobHandlers } from '@/lib/jobs'

function handlers(overrides: Partial<JobHandlers> = {}): JobHandlers {
  return {
    EmailThresholdResponse: vi.fn().mockResolvedValue(undefined),
    DeliverThresholdResponseEmail: vi.fn().mockResolvedValue(undefined),
    ...overrides,
  }
}

const payload = { petitionId: 1, requestedAt: '2015-06-01T12:00:00.000Z' }

describe('retryDelaySeconds', () => {
  it('grows with the fourth power of attempts', () => {
    expect(retryDelaySeconds(1)).toBe(6)
    expect(retryDelaySeconds(2)).toBe(21)
    expect(retryDelaySeconds(4)).toBe(261)
  })
})

describe('performPendingJobs', () => {
  it('runs pending jobs in id order and completes them', async () => {
    const order: number[] = []
    const run = handlers({
      EmailThresholdResponse: vi.fn(async (p: unknown) => {
        if (typeof p === 'object' && p !== null && 'petitionId' in p && typeof p.petitionId === 'number') {
          order.push(p.petitionId)
        }
      }),
    })

    await enqueue('EmailThresholdResponse', { ...payload, petitionId: 1 })
    await enqueue('EmailThresholdResponse', { ...payload, petitionId: 2 })

    await expect(performPendingJobs(run)).resolves.toEqual({ performed: 2, failed: 0 })
    expect(order).toEqual([1, 2])

    const completed = await db.jobs.findMany({ status: 'completed' })
    expect(completed).toHaveLength(2)
  })

  it('picks up jobs enqueued while draining', async () => {
    const run = handlers({
      EmailThresholdResponse: vi.fn(async () => {
        await enqueue('DeliverThresholdResponseEmail', { ...payload, signatureId: 5 })
      }),
    })

    await enqueue('EmailThresholdResponse', payload)

    await expect(performPendingJobs(run)).resolves.toEqual({ performed: 2, failed: 0 })
    expect(run.DeliverThresholdResponseEmail).toHaveBeenCalledWith({ ...payload, signatureId: 5 })
  })

  it('keeps draining past many batches in one call', async () => {
    const run = handlers()
    for (let i = 0; i < 5001; i++) {
      await db.jobs.enqueue('DeliverThresholdResponseEmail', { ...payload, signatureId: i }, new Date())
    }

    await expect(performPendingJobs(run)).resolves.toEqual({ performed: 5001, failed: 0 })
    expect(run.DeliverThresholdResponseEmail).toHaveBeenCalledTimes(5001)
    await expect(db.jobs.findMany({ status: 'pending' })).resolves.toEqual([])
  })

  it('runs each job once when two drains overlap', async () => {
    const seen: number[] = []
    const run = handlers({
      DeliverThresholdResponseEmail: vi.fn(async (p: unknown) => {
        if (typeof p === 'object' && p !== null && 'signatureId' in p && typeof p.signatureId === 'number') {
          seen.push(p.signatureId)
        }
        await new Promise(resolve => setTimeout(resolve, 5))
      }),
    })

    for (const signatureId of [1, 2, 3]) {
      await enqueue('DeliverThresholdResponseEmail', { ...payload, signatureId })
    }

    const [first, second] = await Promise.all([performPendingJobs(run), performPendingJobs(run)])

    expect(first.performed + second.performed).toBe(3)
    expect(seen.sort()).toEqual([1, 2, 3])
    await expect(db.jobs.findMany({ status: 'completed' })).resolves.toHaveLength(3)
  })

  it('leaves jobs scheduled in the future alone', async () => {
    const run = handlers()
    await enqueue('EmailThresholdResponse', payload, new Date(Date.now() + 60_000))

    await expect(performPendingJobs(run)).resolves.toEqual({ performed: 0, failed: 0 })
    expect(run.EmailThresholdResponse).not.toHaveBeenCalled()
  })

  it('reschedules a failed job with backoff', async () => {
    const now = new Date('2015-06-01T12:00:00Z')
    const run = handlers({ EmailThresholdResponse: vi.fn().mockRejectedValue(new Error('SMTP down')) })
    const job = await enqueue('EmailThresholdResponse', payload, now)

    await expect(performPendingJobs(run, () => now)).resolves.toEqual({ performed: 0, failed: 1 })

    const [pending] = await db.jobs.findMany({ status: 'pending' })
    expect(pending.id).toBe(job.id)
    expect(pending.attempts).toBe(1)
    expect(pending.lastError).toBe('SMTP down')
    expect(pending.runAt.toISOString()).toBe('2015-06-01T12:00:06.000Z')
  })

  it(`gives up after ${MAX_ATTEMPTS} attempts`, async () => {
    let now = new Date('2015-06-01T12:00:00Z')
    const run = handlers({ EmailThresholdResponse: vi.fn().mockRejectedValue(new Error('SMTP down')) })
    await enqueue('EmailThresholdResponse', payload, now)

    for (let i = 0; i < MAX_ATTEMPTS; i++) {
      await performPendingJobs(run, () => now)
      now = new Date(now.getTime() + 24 * 60 * 60 * 1000)
    }

    const [failed] = await db.jobs.findMany({ status: 'failed' })
    expect(failed.attempts).toBe(MAX_ATTEMPTS)
    expect(run.EmailThresholdResponse).toHaveBeenCalledTimes(MAX_ATTEMPTS)
  })

  it('fails unknown jobs permanently', async () => {
    await db.jobs.enqueue('RetiredJob', {}, new Date())

    await expect(performPendingJobs(handlers())).resolves.toEqual({ performed: 0, failed: 1 })

    const [failed] = await db.jobs.findMany({ status: 'failed' })
    expect(failed.name).toBe('RetiredJob')
    expect(failed.lastError).toBe('Unknown job: RetiredJob')
  })
})
