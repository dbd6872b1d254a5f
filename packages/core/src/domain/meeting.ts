import { z } from 'zod'

export interface MeetingPlan {
  meetingFormat: string
  discussionTopics: string[]
  giftIdeas: string[]
  preMeetingPreparation: string[]
  followUpPlan: string
  event?: string
  eventSpecificTips?: string[]
}

export interface MeetingReflection {
  missedOpportunities: string[]
  followUpActions: string[]
  suggestedQuestions: string[]
  updatedTimeline: string
}

export const meetingPlanRecordSchema = z.object({
  meeting_format: z.string(),
  discussion_topics: z.array(z.string()),
  gift_ideas: z.array(z.string()),
  pre_meeting_preparation: z.array(z.string()),
  follow_up_plan: z.string(),
  event: z.string().optional(),
  event_specific_tips: z.array(z.string()).optional(),
})

export type MeetingPlanRecord = z.infer<typeof meetingPlanRecordSchema>

export const meetingReflectionRecordSchema = z.object({
  missed_opportunities: z.array(z.string()),
  follow_up_actions: z.array(z.string()),
  suggested_questions: z.array(z.string()),
  updated_timeline: z.string(),
})

export type MeetingReflectionRecord = z.infer<typeof meetingReflectionRecordSchema>

export function parseMeetingPlan(input: unknown): MeetingPlan {
  return meetingPlanFromRecord(meetingPlanRecordSchema.parse(input))
}

export function meetingPlanFromRecord(record: MeetingPlanRecord): MeetingPlan {
  const plan: MeetingPlan = {
    meetingFormat: record.meeting_format,
    discussionTopics: record.discussion_topics,
    giftIdeas: record.gift_ideas,
    preMeetingPreparation: record.pre_meeting_preparation,
    followUpPlan: record.follow_up_plan,
  }
  if (record.event !== undefined) plan.event = record.event
  if (record.event_specific_tips !== undefined) plan.eventSpecificTips = record.event_specific_tips
  return plan
}

export function serializeMeetingPlan(plan: MeetingPlan): MeetingPlanRecord {
  const record: MeetingPlanRecord = {
    meeting_format: plan.meetingFormat,
    discussion_topics: [...plan.discussionTopics],
    gift_ideas: [...plan.giftIdeas],
    pre_meeting_preparation: [...plan.preMeetingPreparation],
    follow_up_plan: plan.followUpPlan,
  }
  if (plan.event !== undefined) record.event = plan.event
  if (plan.eventSpecificTips !== undefined) record.event_specific_tips = [...plan.eventSpecificTips]
  return record
}

export function parseMeetingReflection(input: unknown): MeetingReflection {
  return meetingReflectionFromRecord(meetingReflectionRecordSchema.parse(input))
}

export function meetingReflectionFromRecord(record: MeetingReflectionRecord): MeetingReflection {
  return {
    missedOpportunities: record.missed_opportunities,
    followUpActions: record.follow_up_actions,
    suggestedQuestions: record.suggested_questions,
    updatedTimeline: record.updated_timeline,
  }
}

export function serializeMeetingReflection(reflection: MeetingReflection): MeetingReflectionRecord {
  return {
    missed_opportunities: [...reflection.missedOpportunities],
    follow_up_actions: [...reflection.followUpActions],
    suggested_questions: [...reflection.suggestedQuestions],
    updated_timeline: reflection.updatedTimeline,
  }
}
