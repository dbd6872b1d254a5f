import type { Donor } from '../domain/donor'
import type { MeetingReflection } from '../domain/meeting'
import { MENTORSHIP_DELIVERABLES, MISSED_DELIVERABLE_NOTE, fillTemplate } from '../deliverables'

// An open question is re-suggested when it mentions one of these and the recap does not
const QUESTION_KEYWORDS = ['site visit', 'daughter', 'wine']
const FORGOT_MARKERS = ['forgot', "didn't ask"]

export const DEFAULT_FOLLOW_UP_HORIZON_DAYS = 7

export const REFLECTION_FALLBACKS = {
  missedOpportunities: 'No major gaps detected, but reinforce commitments in your recap.',
  followUpActions: 'Send a thank-you email reiterating next steps within 24 hours.',
  suggestedQuestions: 'No open questions remain; ask what would make the next conversation most useful.',
} as const

export interface ReflectOptions {
  meetingNotes: string
  missedQuestions?: string[]
  horizonDays?: number
}

function unique(items: readonly string[]): string[] {
  return Array.from(new Set(items))
}

function orFallback(items: readonly string[], fallback: string): string[] {
  const deduped = unique(items)
  return deduped.length > 0 ? deduped : [fallback]
}

export function buildMeetingReflection(donor: Donor, options: ReflectOptions): MeetingReflection {
  const notes = options.meetingNotes.toLowerCase()
  const horizon = options.horizonDays ?? DEFAULT_FOLLOW_UP_HORIZON_DAYS

  const followUps: string[] = []
  const missed: string[] = []
  const questions: string[] = [...(options.missedQuestions ?? [])]

  for (const deliverable of MENTORSHIP_DELIVERABLES) {
    if (notes.includes(deliverable.keyword)) continue
    followUps.push(fillTemplate(deliverable.followUpAction, { donor: donor.name }))
    missed.push(fillTemplate(MISSED_DELIVERABLE_NOTE, { keyword: deliverable.keyword, donor: donor.name }))
  }

  for (const question of donor.openQuestions) {
    const lowered = question.toLowerCase()
    for (const keyword of QUESTION_KEYWORDS) {
      if (lowered.includes(keyword) && !notes.includes(keyword)) questions.push(question)
    }
  }

  if (FORGOT_MARKERS.some((marker) => notes.includes(marker))) {
    followUps.push('Send a rapid follow-up covering the topics you noted forgetting during the meeting.')
    questions.push(...donor.openQuestions)
  }

  return {
    missedOpportunities: orFallback(missed, REFLECTION_FALLBACKS.missedOpportunities),
    followUpActions: orFallback(followUps, REFLECTION_FALLBACKS.followUpActions),
    suggestedQuestions: orFallback(questions, REFLECTION_FALLBACKS.suggestedQuestions),
    updatedTimeline:
      `Complete the follow-ups within the next ${horizon} days to keep ${donor.name}'s commitments on track; ` +
      'block calendar time immediately so nothing slips.',
  }
}
