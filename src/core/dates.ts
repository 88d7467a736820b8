export const DAY_MS = 24 * 60 * 60 * 1000

/** Midnight of `date`'s calendar day in the process time zone. */
export function startOfLocalDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate())
}

export function nextLocalDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate() + 1)
}

function pad(n: number): string {
  return String(n).padStart(2, '0')
}

/** `YYYY-MM-DD` of the local calendar day. */
export function localDayKey(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
}

/** `YYYY-MM-DD HH:mm:ss` in local time, the format shown on the dashboard. */
export function formatLocalDateTime(date: Date): string {
  return `${localDayKey(date)} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
}

/**
 * Parses a calendar date to local midnight. Accepts `YYYY-MM-DD` and
 * `DD.MM.YYYY`; returns null for anything else or for impossible dates
 * such as 2025-02-30.
 */
export function parseLocalDay(value: string): Date | null {
  const iso = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value.trim())
  const dotted = /^(\d{2})\.(\d{2})\.(\d{4})$/.exec(value.trim())
  let year: number, month: number, day: number
  if (iso) {
    year = Number(iso[1]); month = Number(iso[2]); day = Number(iso[3])
  } else if (dotted) {
    day = Number(dotted[1]); month = Number(dotted[2]); year = Number(dotted[3])
  } else {
    return null
  }
  const date = new Date(year, month - 1, day)
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) return null
  return date
}
