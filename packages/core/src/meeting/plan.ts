import type { Donor } from '../domain/donor'
import type { MeetingPlan } from '../domain/meeting'

export type ContactCategory = 'in_person' | 'remote' | 'async'

const CONTACT_KEYWORDS: Record<ContactCategory, readonly string[]> = {
  in_person: ['in-person', 'in person', 'coffee', 'lunch', 'dinner', 'site visit', 'meeting'],
  remote: ['phone', 'call', 'video', 'zoom'],
  async: ['email', 'text', 'letter', 'mail'],
}

// Note keywords that earn a dedicated talking point
const NOTE_TOPICS: ReadonlyArray<{ keyword: string; topic: string }> = [
  { keyword: 'wine', topic: 'Explore wine education experiences that fit their sommelier expertise' },
  { keyword: 'robotics', topic: 'Invite them to the next student robotics showcase' },
  { keyword: 'hiking', topic: 'Mention the outdoor leadership trips the program runs each summer' },
  { keyword: 'daughter', topic: "Ask how their daughter's studies are going and connect it to the mentorship work" },
]

export const MAJOR_GIFT_THRESHOLD = 10_000

export interface PlanMeetingOptions {
  meetingDate?: string
  objectives?: string[]
  event?: string
}

export function contactCategory(preferredContact: string): ContactCategory {
  const channel = preferredContact.toLowerCase()
  if (CONTACT_KEYWORDS.in_person.some((k) => channel.includes(k))) return 'in_person'
  if (CONTACT_KEYWORDS.remote.some((k) => channel.includes(k))) return 'remote'
  if (CONTACT_KEYWORDS.async.some((k) => channel.includes(k))) return 'async'
  return 'remote'
}

function meetingFormat(donor: Donor, meetingDate?: string): string {
  const when = meetingDate ? ` on ${meetingDate}` : ''
  switch (contactCategory(donor.preferredContact)) {
    case 'in_person':
      return `Coffee meeting with ${donor.name} at their preferred venue in ${donor.primaryCity ?? 'their city'}${when}`
    case 'remote':
      return `Video call with ${donor.name}${when}, scheduled within their ${donor.timeZone ?? 'local'} business hours`
    case 'async':
      return `Personalized email briefing to ${donor.name}${when}, with an invitation to a short follow-up call`
  }
}

function discussionTopics(donor: Donor, objectives: readonly string[]): string[] {
  const topics = donor.interests.map((interest) => `Share recent program outcomes related to ${interest}`)
  if (topics.length === 0) topics.push('Share impact metrics from the latest program milestone')
  const notes = donor.notes.toLowerCase()
  for (const { keyword, topic } of NOTE_TOPICS) {
    if (notes.includes(keyword)) topics.push(topic)
  }
  topics.push(...objectives)
  return topics
}

function giftIdeas(donor: Donor): string[] {
  const ideas = ['Bring a hand-written thank-you card referencing their recent support']
  const [firstInterest] = donor.interests
  if (firstInterest) ideas.push(`Bring a small keepsake from the ${firstInterest} program`)
  if ((donor.lastGiftAmount ?? 0) >= MAJOR_GIFT_THRESHOLD) {
    ideas.push('Offer a private site visit with program leadership')
  } else {
    ideas.push('Share a short impact story showing what their last gift made possible')
  }
  return ideas
}

export function buildMeetingPlan(donor: Donor, options: PlanMeetingOptions = {}): MeetingPlan {
  const { meetingDate, objectives = [], event } = options
  const plan: MeetingPlan = {
    meetingFormat: meetingFormat(donor, meetingDate),
    discussionTopics: discussionTopics(donor, objectives),
    giftIdeas: giftIdeas(donor),
    preMeetingPreparation: [
      'Revisit detailed notes and open questions',
      'Draft answers for any objectives the donor asked about',
    ],
    followUpPlan:
      'Send a thank-you note within 24 hours summarizing agreed actions, attach relevant materials, ' +
      'and confirm next checkpoints.',
  }
  if (donor.openQuestions.length > 0) {
    plan.preMeetingPreparation.push(`Prepare answers for ${donor.openQuestions.length} open question(s) on file`)
  }

  if (event) {
    plan.event = event
    plan.eventSpecificTips = [
      'Personalize the agenda with one high-impact story tied directly to the event theme so the conversation feels anchored.',
      `Confirm logistics like guest list, dress code, and any moments where ${donor.name} can speak or be recognized.`,
      `Bring a small keepsake that ties ${donor.name}'s interests to the event experience.`,
    ]
    plan.preMeetingPreparation.push(
      'Draft talking points specific to the event so you can move naturally from celebration to commitment.'
    )
  }
  return plan
}
