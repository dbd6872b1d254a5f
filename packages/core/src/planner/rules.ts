import type { DateTime } from 'luxon'
import type { Donor } from '../domain/donor'
import { isOutreachHalted } from '../domain/donor'
import type { ScheduleEntry } from '../domain/schedule'
import { findDonor } from '../data/loader'
import { PINNED_COMMITMENTS, fillTemplate } from '../deliverables'
import { daysBetween, parseDate, toClock, toDateKey, tryParseDate } from './time'
import { FocusFlags, PriorityTier, TaskCandidate } from './types'

export interface RuleContext {
  donors: Donor[]
  schedule: ScheduleEntry[]
  today: string
  directives: string[]
  focus: FocusFlags
  reconnectAfterDays: number
}

const LOCATION_ALIASES = ['los angeles', 'pasadena']
const OPTIONAL_MARKERS = ['optional', 'if time', 'defer', 'nice to have', 'can skip']
const DISENGAGEMENT_PHRASES = ['prefers fewer', 'not ready']

function directivePrefix(directive: string): string {
  return `Directive: "${directive}".`
}

export function pinnedCommitmentTasks({ donors }: RuleContext): TaskCandidate[] {
  const out: TaskCandidate[] = []
  for (const donor of donors) {
    const notes = donor.notes.toLowerCase()
    for (const commitment of PINNED_COMMITMENTS) {
      if (!notes.includes(commitment.trigger)) continue
      for (const deliverable of commitment.deliverables) {
        out.push({
          task: deliverable.task,
          reason: fillTemplate(deliverable.pinnedReason, { donor: donor.name }),
          relatedDonors: [donor.name],
          tier: PriorityTier.pinned,
        })
      }
    }
  }
  return out
}

export function scheduledTasks({ donors, schedule, today, directives }: RuleContext): TaskCandidate[] {
  const out: TaskCandidate[] = []
  for (const entry of schedule) {
    if (toDateKey(entry.start) !== today) continue
    const time = toClock(entry.start)

    if (entry.donor) {
      const donor = findDonor(donors, entry.donor)
      if (donor && isOutreachHalted(donor)) continue
      const name = donor?.name ?? entry.donor
      out.push({
        task: `Prep briefing for ${name}`,
        reason:
          `Prep for ${entry.title} at ${entry.location || 'the scheduled venue'}. ` +
          `Use the agenda notes: ${entry.notes || 'Review donor priorities.'}`,
        relatedDonors: [name],
        tier: PriorityTier.scheduled,
        time,
      })
      continue
    }

    const notes = entry.notes.toLowerCase()
    const optional = OPTIONAL_MARKERS.some((marker) => notes.includes(marker))
    const directed = directives.length > 0
    let tier: PriorityTier = PriorityTier.scheduled
    if (optional && directed) tier = PriorityTier.deferredPrep
    else if (optional || directed) tier = PriorityTier.generalPrep

    out.push({
      task: `Prepare for ${entry.title}`,
      reason: optional
        ? 'Marked optional in the calendar notes; attend once donor-specific work is covered.'
        : 'Gather the required program updates so every donor follow-up stays accurate.',
      relatedDonors: [],
      tier,
      time,
    })
  }
  return out
}

export function locationTasks({ donors, focus }: RuleContext): TaskCandidate[] {
  const directive = focus.location
  if (directive === undefined) return []
  const out: TaskCandidate[] = []
  for (const donor of donors) {
    const city = donor.primaryCity
    if (!city || isOutreachHalted(donor)) continue
    const lowered = city.toLowerCase()
    if (!LOCATION_ALIASES.some((alias) => lowered.includes(alias))) continue
    out.push({
      task: `Schedule Los Angeles touchpoint with ${donor.name}`,
      reason:
        `${directivePrefix(directive)} ${donor.name} is based in ${city}, ` +
        "so coordinate a coffee or site visit while you're in town.",
      relatedDonors: [donor.name],
      tier: PriorityTier.directed,
    })
  }
  return out
}

/** Days since the latest parseable interaction, or null when none can be dated. */
export function daysSinceLastInteraction(donor: Donor, today: string): number | null {
  let latest: DateTime | null = null
  for (const interaction of donor.interactions) {
    const date = tryParseDate(interaction.date)
    if (!date) continue
    if (latest === null || date > latest) latest = date
  }
  return latest === null ? null : daysBetween(latest, parseDate(today))
}

export function reconnectTasks({ donors, today, focus, reconnectAfterDays }: RuleContext): TaskCandidate[] {
  const directive = focus.reconnect
  if (directive === undefined) return []
  const out: TaskCandidate[] = []
  for (const donor of donors) {
    const gap = daysSinceLastInteraction(donor, today)
    if (gap === null) {
      out.push({
        task: `Introduce yourself to ${donor.name}`,
        reason: `${directivePrefix(directive)} There's no prior interaction logged, so send a welcome message to ${donor.name}.`,
        relatedDonors: [donor.name],
        tier: PriorityTier.directed,
      })
    } else if (gap > reconnectAfterDays) {
      out.push({
        task: `Reconnect with ${donor.name}`,
        reason:
          `${directivePrefix(directive)} It's been ${gap} days since the last touchpoint with ${donor.name}; ` +
          'send a tailored update to restart the conversation.',
        relatedDonors: [donor.name],
        tier: PriorityTier.directed,
      })
    }
  }
  return out
}

export function disqualifyTasks({ donors, focus }: RuleContext): TaskCandidate[] {
  const directive = focus.disqualify
  if (directive === undefined) return []
  const out: TaskCandidate[] = []
  for (const donor of donors) {
    const notes = donor.notes.toLowerCase()
    let why: string | undefined
    if (donor.status === 'paused' || donor.status === 'disqualified') {
      why = `${donor.name} is already marked ${donor.status}; confirm outreach stays on hold and record the reason.`
    } else if (DISENGAGEMENT_PHRASES.some((phrase) => notes.includes(phrase))) {
      why =
        `${donor.name} has signaled limited interest recently; review whether continued outreach adds value ` +
        'or if you should disqualify for now.'
    } else if (donor.engagementStage?.toLowerCase() === 'qualification') {
      why = `${donor.name} is still in qualification; decide whether another touchpoint is worth it or pause until they re-engage.`
    }
    if (!why) continue
    out.push({
      task: `Pause outreach to ${donor.name}`,
      reason: `${directivePrefix(directive)} ${why}`,
      relatedDonors: [donor.name],
      tier: PriorityTier.pause,
    })
  }
  return out
}

export function fallbackTask(): TaskCandidate {
  return {
    task: 'Review donor database',
    reason: 'No schedule items or directives produced specific actions today; scan the database for emerging opportunities.',
    relatedDonors: [],
    tier: PriorityTier.fallback,
  }
}
