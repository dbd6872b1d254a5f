import type { Donor } from '../domain/donor'
import type { ScheduleEntry } from '../domain/schedule'

export function makeDonor(overrides: Partial<Donor> & { name: string }): Donor {
  return {
    givingCapacity: 'unknown',
    interests: [],
    preferredContact: 'email',
    notes: '',
    status: 'active',
    strategicObjectives: [],
    openQuestions: [],
    interactions: [],
    ...overrides,
  }
}

export function makeEntry(overrides: Partial<ScheduleEntry> & { start: string }): ScheduleEntry {
  return {
    end: overrides.start,
    title: 'Meeting',
    notes: '',
    ...overrides,
  }
}
