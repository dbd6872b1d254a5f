import { buildMeetingPlan, contactCategory } from '../meeting/plan'
import { REFLECTION_FALLBACKS, buildMeetingReflection } from '../meeting/reflection'
import { makeDonor } from './fixtures'

const alicia = makeDonor({
  name: 'Alicia Gomez',
  interests: ['STEM education', 'mentorship'],
  preferredContact: 'coffee meeting',
  lastGiftAmount: 25000,
  notes: 'Former robotics engineer and certified sommelier; loves wine pairings.',
  primaryCity: 'Los Angeles',
  openQuestions: [
    'Would she host a site visit for the board?',
    'Is her daughter still interested in volunteering?',
    'Which gala table should she sit at?',
  ],
})

describe('buildMeetingPlan', () => {
  it('tailors format, topics and gifts to the donor', () => {
    const plan = buildMeetingPlan(alicia, {
      meetingDate: '2024-03-25',
      objectives: ['Confirm mentorship deliverables are ready'],
    })
    expect(plan).toEqual({
      meetingFormat: 'Coffee meeting with Alicia Gomez at their preferred venue in Los Angeles on 2024-03-25',
      discussionTopics: [
        'Share recent program outcomes related to STEM education',
        'Share recent program outcomes related to mentorship',
        'Explore wine education experiences that fit their sommelier expertise',
        'Invite them to the next student robotics showcase',
        'Confirm mentorship deliverables are ready',
      ],
      giftIdeas: [
        'Bring a hand-written thank-you card referencing their recent support',
        'Bring a small keepsake from the STEM education program',
        'Offer a private site visit with program leadership',
      ],
      preMeetingPreparation: [
        'Revisit detailed notes and open questions',
        'Draft answers for any objectives the donor asked about',
        'Prepare answers for 3 open question(s) on file',
      ],
      followUpPlan:
        'Send a thank-you note within 24 hours summarizing agreed actions, attach relevant materials, ' +
        'and confirm next checkpoints.',
    })
  })

  it('falls back to generic topics and smaller gifts', () => {
    const plan = buildMeetingPlan(makeDonor({ name: 'Cara Lee', lastGiftAmount: 500 }))
    expect(plan.meetingFormat).toBe(
      'Personalized email briefing to Cara Lee, with an invitation to a short follow-up call'
    )
    expect(plan.discussionTopics).toEqual(['Share impact metrics from the latest program milestone'])
    expect(plan.giftIdeas).toEqual([
      'Bring a hand-written thank-you card referencing their recent support',
      'Share a short impact story showing what their last gift made possible',
    ])
    expect(plan.event).toBeUndefined()
  })

  it('adds event guidance and an extra preparation step', () => {
    const plan = buildMeetingPlan(alicia, { event: 'Meet Alicia Gomez at Gala 2025' })
    expect(plan.event).toBe('Meet Alicia Gomez at Gala 2025')
    expect(plan.eventSpecificTips).toHaveLength(3)
    expect(plan.eventSpecificTips?.[1]).toBe(
      'Confirm logistics like guest list, dress code, and any moments where Alicia Gomez can speak or be recognized.'
    )
    expect(plan.preMeetingPreparation[plan.preMeetingPreparation.length - 1]).toBe(
      'Draft talking points specific to the event so you can move naturally from celebration to commitment.'
    )
  })

  it.each([
    ['in-person lunch', 'in_person'],
    ['Phone', 'remote'],
    ['Zoom', 'remote'],
    ['email', 'async'],
    ['carrier pigeon', 'remote'],
  ] as const)('classifies %s as %s', (channel, expected) => {
    expect(contactCategory(channel)).toBe(expected)
  })
})

describe('buildMeetingReflection', () => {
  it('flags every tracked deliverable missing from the notes, in table order', () => {
    const reflection = buildMeetingReflection(alicia, { meetingNotes: 'Talked about the site visit and wine.' })
    expect(reflection.missedOpportunities).toEqual([
      "Missed the chance to confirm the mentor background checks; Alicia Gomez's pledge depends on seeing this handled.",
      "Missed the chance to confirm the matching roster; Alicia Gomez's pledge depends on seeing this handled.",
      "Missed the chance to confirm the progress dashboard; Alicia Gomez's pledge depends on seeing this handled.",
    ])
    expect(reflection.followUpActions).toEqual([
      'Finalize and send the cleared mentor background checks so Alicia Gomez knows the program is ready.',
      'Share the complete mentor-mentee roster and highlight STEM pairings to honor the pledge conditions.',
      'Publish the mentorship progress dashboard and include it in your follow-up email.',
    ])
    expect(reflection.suggestedQuestions).toEqual(['Is her daughter still interested in volunteering?'])
    expect(reflection.updatedTimeline).toBe(
      "Complete the follow-ups within the next 7 days to keep Alicia Gomez's commitments on track; " +
        'block calendar time immediately so nothing slips.'
    )
  })

  it('substitutes fallbacks when nothing was missed', () => {
    const reflection = buildMeetingReflection(alicia, {
      meetingNotes: 'Covered mentor background checks, the matching roster, the progress dashboard, her daughter and the site visit.',
      horizonDays: 5,
    })
    expect(reflection.missedOpportunities).toEqual([REFLECTION_FALLBACKS.missedOpportunities])
    expect(reflection.followUpActions).toEqual([REFLECTION_FALLBACKS.followUpActions])
    expect(reflection.suggestedQuestions).toEqual([REFLECTION_FALLBACKS.suggestedQuestions])
    expect(reflection.updatedTimeline.startsWith('Complete the follow-ups within the next 5 days')).toBe(true)
  })

  it('re-surfaces every open question when the recap admits forgetting', () => {
    const reflection = buildMeetingReflection(alicia, {
      meetingNotes: 'Covered mentor background checks, matching roster and progress dashboard. I forgot the site visit.',
      missedQuestions: ['Which gala table should she sit at?', 'Any matching gift at her company?'],
    })
    expect(reflection.followUpActions).toEqual([
      'Send a rapid follow-up covering the topics you noted forgetting during the meeting.',
    ])
    expect(reflection.suggestedQuestions).toEqual([
      'Which gala table should she sit at?',
      'Any matching gift at her company?',
      'Is her daughter still interested in volunteering?',
      'Would she host a site visit for the board?',
    ])
  })
})
