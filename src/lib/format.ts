/** `10000` → `"10,000"` */
export function formatDelimited(value: number): string {
  const [whole, fraction] = String(value).split('.')
  const delimited = whole.replace(/\B(?=(\d{3})+(?!\d))/g, ',')
  return fraction === undefined ? delimited : `${delimited}.${fraction}`
}

export function endOfDay(time: Date): Date {
  const result = new Date(time.getTime())
  result.setUTCHours(23, 59, 59, 999)
  return result
}

/**
 * Calendar month arithmetic in UTC. The day of month is clamped to the
 * length of the target month (31 Jan + 1 month = 28/29 Feb).
 */
export function addMonths(time: Date, months: number): Date {
  const year = time.getUTCFullYear()
  const month = time.getUTCMonth() + months
  const lastDay = new Date(Date.UTC(year, month + 1, 0)).getUTCDate()
  const result = new Date(time.getTime())
  result.setUTCDate(1)
  result.setUTCFullYear(year, month, Math.min(time.getUTCDate(), lastDay))
  return result
}

/**
 * Parse `dd/mm/yyyy` or `yyyy-mm-dd` into an ISO calendar date.
 * Returns null for anything that is not a real date.
 */
export function parseCalendarDate(input: string): string | null {
  const trimmed = input.trim()
  let match = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/.exec(trimmed)
  let year: number, month: number, day: number

  if (match) {
    day = Number(match[1])
    month = Number(match[2])
    year = Number(match[3])
  } else {
    match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(trimmed)
    if (!match) return null
    year = Number(match[1])
    month = Number(match[2])
    day = Number(match[3])
  }

  const date = new Date(Date.UTC(year, month - 1, day))
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null
  }

  return date.toISOString().slice(0, 10)
}
