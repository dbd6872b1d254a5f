// Date helpers over ISO-8601 strings. Records keep their dates as strings; luxon does the parsing.
// Timestamps without an offset are read as wall-clock time, so date keys and clock labels match what the file says.

import { DateTime } from 'luxon'

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/

export function isIsoDate(value: string): boolean {
  return ISO_DATE.test(value) && DateTime.fromISO(value, { zone: 'utc' }).isValid
}

export function isIsoTimestamp(value: string): boolean {
  return DateTime.fromISO(value, { setZone: true }).isValid
}

export function parseTimestamp(value: string): DateTime {
  const parsed = DateTime.fromISO(value, { setZone: true })
  if (!parsed.isValid) {
    throw new RangeError(`Invalid ISO-8601 timestamp "${value}": ${parsed.invalidExplanation ?? parsed.invalidReason ?? 'unparseable'}`)
  }
  return parsed
}

// Lenient variant for values that may be skipped when they do not parse
export function tryParseDate(value: string): DateTime | null {
  const parsed = DateTime.fromISO(value, { zone: 'utc' })
  return parsed.isValid ? parsed.startOf('day') : null
}

export function toDateKey(timestamp: string): string {
  return parseTimestamp(timestamp).toFormat('yyyy-MM-dd')
}

export function toClock(timestamp: string): string {
  return parseTimestamp(timestamp).toFormat('HH:mm')
}

export function daysBetween(earlier: DateTime, later: DateTime): number {
  return Math.round(later.startOf('day').diff(earlier.startOf('day'), 'days').days)
}

export function isSameIsoWeek(timestamp: string, date: string): boolean {
  const a = parseTimestamp(timestamp)
  const b = DateTime.fromISO(date, { zone: 'utc' })
  return a.weekYear === b.weekYear && a.weekNumber === b.weekNumber
}

export function todayKey(zone?: string): string {
  const now = zone ? DateTime.now().setZone(zone) : DateTime.now()
  return now.toFormat('yyyy-MM-dd')
}

export function parseDate(value: string): DateTime {
  const parsed = tryParseDate(value)
  if (!parsed || !isIsoDate(value)) throw new RangeError(`Invalid date "${value}": expected YYYY-MM-DD`)
  return parsed
}

export const SLOT_ORDER = ['08:00', '09:30', '10:45', '12:15', '14:00', '15:30', '16:45', '17:30'] as const

export const FLEX_SLOT = 'flex'

// Tasks that already carry a time keep it; the rest take the next unused slot, reusing the last one once
// the list runs out. A slot may coincide with a scheduled task's time; that collision is left as is.
export function assignTimeSlots<T extends { time?: string }>(
  items: readonly T[],
  slotOrder: readonly string[] = SLOT_ORDER
): Array<T & { time: string }> {
  let cursor = 0
  return items.map((item) => {
    if (item.time) return { ...item, time: item.time }
    const slot = slotOrder[Math.min(cursor, slotOrder.length - 1)] ?? FLEX_SLOT
    cursor += 1
    return { ...item, time: slot }
  })
}
