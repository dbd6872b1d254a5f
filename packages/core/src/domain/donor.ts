import { z } from 'zod'
import { isIsoDate } from '../planner/time'

export const DONOR_STATUSES = ['active', 'paused', 'disqualified', 'inactive'] as const

export type DonorStatus = typeof DONOR_STATUSES[number]

const isoDate = z.string().refine(isIsoDate, { message: 'Expected a YYYY-MM-DD date' })

export const interactionRecordSchema = z.object({
  date: isoDate,
  type: z.string().default('meeting'), // meeting | call | email | ...
  notes: z.string().default(''),
})

export type InteractionRecord = z.input<typeof interactionRecordSchema>

export interface Interaction {
  date: string // YYYY-MM-DD
  type: string
  notes: string
}

// On-disk / wire shape (snake_case). Missing optional fields may be absent or null.
export const donorRecordSchema = z.object({
  name: z.string().min(1),
  giving_capacity: z.string().default('unknown'),
  interests: z.array(z.string()).default([]),
  preferred_contact: z.string().default('email'),
  last_gift_date: isoDate.nullish(),
  last_gift_amount: z.number().nullish(),
  notes: z.string().default(''),
  primary_city: z.string().nullish(),
  time_zone: z.string().nullish(),
  engagement_stage: z.string().nullish(),
  status: z.enum(DONOR_STATUSES).default('active'),
  strategic_objectives: z.array(z.string()).default([]),
  open_questions: z.array(z.string()).default([]),
  interactions: z.array(interactionRecordSchema).default([]),
})

export type DonorRecord = z.input<typeof donorRecordSchema>

export type ParsedDonorRecord = z.output<typeof donorRecordSchema>

export interface Donor {
  name: string
  givingCapacity: string
  interests: string[]
  preferredContact: string
  lastGiftDate?: string
  lastGiftAmount?: number
  notes: string
  primaryCity?: string
  timeZone?: string
  engagementStage?: string
  status: DonorStatus
  strategicObjectives: string[]
  openQuestions: string[]
  // Not ordered; sort by date where recency matters
  interactions: Interaction[]
}

export function parseDonor(input: unknown): Donor {
  return donorFromRecord(donorRecordSchema.parse(input))
}

export function donorFromRecord(record: ParsedDonorRecord): Donor {
  return {
    name: record.name,
    givingCapacity: record.giving_capacity,
    interests: record.interests,
    preferredContact: record.preferred_contact,
    lastGiftDate: record.last_gift_date ?? undefined,
    lastGiftAmount: record.last_gift_amount ?? undefined,
    notes: record.notes,
    primaryCity: record.primary_city ?? undefined,
    timeZone: record.time_zone ?? undefined,
    engagementStage: record.engagement_stage ?? undefined,
    status: record.status,
    strategicObjectives: record.strategic_objectives,
    openQuestions: record.open_questions,
    interactions: record.interactions.map((i) => ({ date: i.date, type: i.type, notes: i.notes })),
  }
}

export function serializeDonor(donor: Donor): DonorRecord {
  return {
    name: donor.name,
    giving_capacity: donor.givingCapacity,
    interests: [...donor.interests],
    preferred_contact: donor.preferredContact,
    last_gift_date: donor.lastGiftDate ?? null,
    last_gift_amount: donor.lastGiftAmount ?? null,
    notes: donor.notes,
    primary_city: donor.primaryCity ?? null,
    time_zone: donor.timeZone ?? null,
    engagement_stage: donor.engagementStage ?? null,
    status: donor.status,
    strategic_objectives: [...donor.strategicObjectives],
    open_questions: [...donor.openQuestions],
    interactions: donor.interactions.map((i) => ({ date: i.date, type: i.type, notes: i.notes })),
  }
}

const HALTED_STATUSES: ReadonlySet<DonorStatus> = new Set(['paused', 'disqualified', 'inactive'])

export function isOutreachHalted(donor: Pick<Donor, 'status'>): boolean {
  return HALTED_STATUSES.has(donor.status)
}

/** Appends free text to a donor's notes, separated by a single space. */
export function appendDonorNote(donor: Donor, note: string): void {
  const text = note.trim()
  if (!text) return
  if (donor.notes && !donor.notes.endsWith(' ')) donor.notes += ' '
  donor.notes += text
}
