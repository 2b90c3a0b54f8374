import type { ReportPeriod } from './types.js'

const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December'
] as const

const MS_PER_DAY = 24 * 60 * 60 * 1000

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0')
}

/** Calendar date in local time as YYYY-MM-DD. */
export function formatDate(date: Date): string {
  return `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
}

export function shiftDays(date: Date, days: number): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate() + days)
}

// Overflowing days roll into the next month (March 31 minus one month is March 2 or 3).
export function shiftMonths(date: Date, months: number): Date {
  return new Date(date.getFullYear(), date.getMonth() + months, date.getDate())
}

function isCalendarDate(year: number, month: number, day: number): boolean {
  const candidate = new Date(Date.UTC(year, month - 1, day))
  return candidate.getUTCFullYear() === year && candidate.getUTCMonth() === month - 1 && candidate.getUTCDate() === day
}

/** Accepts exactly YYYY-MM-DD naming a real calendar day; returns it normalized or null. */
export function parseIsoDate(text: string): string | null {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(text)
  if (!match) {
    return null
  }
  const [, year, month, day] = match
  if (!isCalendarDate(Number(year), Number(month), Number(day))) {
    return null
  }
  return `${year}-${month}-${day}`
}

function lastDayOfMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate()
}

export function parseMonth(text: string): ReportPeriod | null {
  const match = /^(\d{4})-(\d{2})$/.exec(text)
  if (!match) {
    return null
  }
  const year = Number(match[1])
  const month = Number(match[2])
  const name = MONTH_NAMES[month - 1]
  if (name === undefined) {
    return null
  }
  return {
    startDate: `${pad(year, 4)}-${pad(month)}-01`,
    endDate: `${pad(year, 4)}-${pad(month)}-${pad(lastDayOfMonth(year, month))}`,
    label: `${name} ${year}`
  }
}

export function parseYear(text: string): ReportPeriod | null {
  if (!/^\d{4}$/.test(text)) {
    return null
  }
  const year = Number(text)
  if (year < 1900 || year > 2100) {
    return null
  }
  return {
    startDate: `${text}-01-01`,
    endDate: `${text}-12-31`,
    label: `Year ${year}`
  }
}

export function lastMonthsPeriod(now: Date, months: number): ReportPeriod {
  return {
    startDate: formatDate(shiftMonths(now, -months)),
    endDate: formatDate(now),
    label: `Last ${months} months`
  }
}

/** Whole days from an ISO date to the local calendar day of `to`. */
export function daysBetween(from: string, to: Date): number {
  const [year, month, day] = from.split('-').map(Number)
  const start = Date.UTC(year ?? 0, (month ?? 1) - 1, day ?? 1)
  const end = Date.UTC(to.getFullYear(), to.getMonth(), to.getDate())
  return Math.round((end - start) / MS_PER_DAY)
}
