import { z } from 'zod'
import {
  donorRecordSchema,
  meetingPlanRecordSchema,
  meetingReflectionRecordSchema,
  scheduleRecordSchema,
  taskRecordSchema,
} from '@steward/core'

// Requests are tagged by `request` so one model endpoint can serve all three
export const dailyTodoRequestSchema = z.object({
  request: z.literal('daily_todo'),
  date: z.string(),
  schedule: z.array(scheduleRecordSchema),
  donors: z.array(donorRecordSchema),
  directives: z.array(z.string()).default([]),
  guidelines: z.array(z.string()).default([]),
})

export const meetingPlanRequestSchema = z.object({
  request: z.literal('meeting_plan'),
  meeting_date: z.string(),
  donor: donorRecordSchema,
  fundraiser_objectives: z.array(z.string()).default([]),
  event: z.string().nullish(),
  expectations: z.array(z.string()).default([]),
})

export const meetingReflectionRequestSchema = z.object({
  request: z.literal('meeting_reflection'),
  donor: donorRecordSchema,
  meeting_notes: z.string(),
  missed_questions: z.array(z.string()).default([]),
  follow_up_horizon_days: z.number().int().positive().default(7),
  expectations: z.array(z.string()).default([]),
})

export const assistantRequestSchema = z.discriminatedUnion('request', [
  dailyTodoRequestSchema,
  meetingPlanRequestSchema,
  meetingReflectionRequestSchema,
])

export type DailyTodoRequest = z.input<typeof dailyTodoRequestSchema>
export type MeetingPlanRequest = z.input<typeof meetingPlanRequestSchema>
export type MeetingReflectionRequest = z.input<typeof meetingReflectionRequestSchema>
export type AssistantRequest = z.input<typeof assistantRequestSchema>
export type ParsedAssistantRequest = z.output<typeof assistantRequestSchema>

export const dailyTodoResponseSchema = z.object({
  tasks: z.array(taskRecordSchema),
})

export type DailyTodoResponse = z.output<typeof dailyTodoResponseSchema>

export const meetingPlanResponseSchema = meetingPlanRecordSchema
export const meetingReflectionResponseSchema = meetingReflectionRecordSchema

export const DAILY_TODO_KEYS = ['tasks'] as const

export const MEETING_PLAN_KEYS = [
  'meeting_format',
  'discussion_topics',
  'gift_ideas',
  'pre_meeting_preparation',
  'follow_up_plan',
] as const

export const MEETING_REFLECTION_KEYS = [
  'missed_opportunities',
  'follow_up_actions',
  'suggested_questions',
  'updated_timeline',
] as const
