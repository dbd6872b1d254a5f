import { z } from 'zod'
import { isIsoTimestamp } from '../planner/time'

const isoTimestamp = z.string().refine(isIsoTimestamp, { message: 'Expected an ISO-8601 timestamp' })

export const scheduleRecordSchema = z.object({
  start: isoTimestamp,
  end: isoTimestamp,
  title: z.string().default('Meeting'),
  donor: z.string().nullish(),
  location: z.string().nullish(),
  notes: z.string().default(''),
})

export type ScheduleRecord = z.input<typeof scheduleRecordSchema>

export type ParsedScheduleRecord = z.output<typeof scheduleRecordSchema>

export interface ScheduleEntry {
  start: string
  end: string
  title: string
  // Weak reference by donor name; may not resolve
  donor?: string
  location?: string
  notes: string
}

export function parseScheduleEntry(input: unknown): ScheduleEntry {
  return scheduleEntryFromRecord(scheduleRecordSchema.parse(input))
}

export function scheduleEntryFromRecord(record: ParsedScheduleRecord): ScheduleEntry {
  return {
    start: record.start,
    end: record.end,
    title: record.title,
    donor: record.donor ?? undefined,
    location: record.location ?? undefined,
    notes: record.notes,
  }
}

export function serializeScheduleEntry(entry: ScheduleEntry): ScheduleRecord {
  return {
    start: entry.start,
    end: entry.end,
    title: entry.title,
    donor: entry.donor ?? null,
    location: entry.location ?? null,
    notes: entry.notes,
  }
}
