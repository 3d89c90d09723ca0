export const DEFAULT_TIMEZONE = 'Asia/Tokyo'

const DAY_MS = 24 * 60 * 60 * 1000

/** YYYY-MM-DD of `date` as seen in `timeZone`. */
export function getZonedDate(date: Date = new Date(), timeZone: string = DEFAULT_TIMEZONE): string {
  return new Intl.DateTimeFormat('en-CA', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).format(date)
}

export function getYesterday(now: Date = new Date(), timeZone: string = DEFAULT_TIMEZONE): string {
  return getZonedDate(new Date(now.getTime() - DAY_MS), timeZone)
}

export function compactDate(isoDate: string): string {
  return isoDate.replaceAll('-', '')
}

export function isIsoDate(value: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return false
  const parsed = new Date(`${value}T00:00:00Z`)
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().startsWith(value)
}
