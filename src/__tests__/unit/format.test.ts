import { describe, it, expect } from 'vitest'
import { addMonths, endOfDay, formatDelimited, parseCalendarDate } from '@/lib/format'

describe('formatDelimited', () => {
  it('leaves short numbers alone', () => {
    expect(formatDelimited(999)).toBe('999')
  })

  it('groups thousands with commas', () => {
    expect(formatDelimited(10000)).toBe('10,000')
    expect(formatDelimited(100000)).toBe('100,000')
    expect(formatDelimited(1234567)).toBe('1,234,567')
  })
})

describe('endOfDay', () => {
  it('moves to the last millisecond of the UTC day', () => {
    expect(endOfDay(new Date('2015-06-01T10:30:00Z')).toISOString()).toBe('2015-06-01T23:59:59.999Z')
  })
})

describe('addMonths', () => {
  it('adds calendar months', () => {
    expect(addMonths(new Date('2015-06-01T12:00:00Z'), 6).toISOString()).toBe('2015-12-01T12:00:00.000Z')
  })

  it('clamps to the end of a shorter month', () => {
    expect(addMonths(new Date('2015-08-31T12:00:00Z'), 6).toISOString()).toBe('2016-02-29T12:00:00.000Z')
    expect(addMonths(new Date('2016-03-31T12:00:00Z'), -1).toISOString()).toBe('2016-02-29T12:00:00.000Z')
  })

  it('crosses year boundaries backwards', () => {
    expect(addMonths(new Date('2016-02-15T00:00:00Z'), -9).toISOString()).toBe('2015-05-15T00:00:00.000Z')
  })
})

describe('parseCalendarDate', () => {
  it('reads day/month/year', () => {
    expect(parseCalendarDate('06/12/2015')).toBe('2015-12-06')
    expect(parseCalendarDate('6/1/2016')).toBe('2016-01-06')
  })

  it('reads ISO dates', () => {
    expect(parseCalendarDate('2015-12-06')).toBe('2015-12-06')
  })

  it('rejects impossible dates', () => {
    expect(parseCalendarDate('31/02/2015')).toBeNull()
    expect(parseCalendarDate('2015-13-01')).toBeNull()
  })

  it('rejects other formats', () => {
    expect(parseCalendarDate('next tuesday')).toBeNull()
    expect(parseCalendarDate('2015/12/06')).toBeNull()
  })
})
