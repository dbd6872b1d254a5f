import type { Donor } from '../domain/donor'
import type { ScheduleEntry } from '../domain/schedule'

export type FocusKind = 'location' | 'reconnect' | 'disqualify'

// Each raised flag carries the first directive (original casing) that raised it
export type FocusFlags = Partial<Record<FocusKind, string>>

// Lower is more urgent
export const PriorityTier = {
  pinned: 0,
  scheduled: 1,
  directed: 2,
  pause: 3,
  generalPrep: 4, // undirected prep while directives are active, or optional prep
  deferredPrep: 5, // optional prep while directives are active
  fallback: 6,
} as const

export type PriorityTier = typeof PriorityTier[keyof typeof PriorityTier]

export interface TaskCandidate {
  task: string
  reason: string
  relatedDonors: string[]
  tier: PriorityTier
  time?: string // set for schedule-derived tasks
}

export interface RankTasksArgs {
  donors: Donor[]
  schedule: ScheduleEntry[]
  today: string // YYYY-MM-DD
  directives?: string[]
}

export interface RankingPreferences {
  maxTasks: number
  reconnectAfterDays: number
  slotOrder: readonly string[]
}
