import {
  Donor,
  MeetingPlan,
  MeetingReflection,
  ScheduleEntry,
  Task,
  activeDirectives,
  createLogger,
  meetingPlanFromRecord,
  meetingReflectionFromRecord,
  serializeDonor,
  serializeScheduleEntry,
  taskFromRecord,
  toDateKey,
  todayKey,
} from '@steward/core'
import { LLMClient } from './client'
import { completeJson } from './gateway'
import { OpenAIChatClient } from './openai-client'
import { postProcessTasks } from './postprocess'
import {
  MEETING_EXPECTATIONS,
  MEETING_SYSTEM_PROMPT,
  REFLECTION_EXPECTATIONS,
  REFLECTION_SYSTEM_PROMPT,
  TODO_GUIDELINES,
  TODO_SYSTEM_PROMPT,
} from './prompts'
import {
  DAILY_TODO_KEYS,
  DailyTodoRequest,
  MEETING_PLAN_KEYS,
  MEETING_REFLECTION_KEYS,
  MeetingPlanRequest,
  MeetingReflectionRequest,
  dailyTodoResponseSchema,
  meetingPlanResponseSchema,
  meetingReflectionResponseSchema,
} from './schemas'

const log = createLogger('assistant')

export interface DailyTodoArgs {
  donors: Donor[]
  schedule: ScheduleEntry[]
  today?: string
  directives?: string[]
  llm?: LLMClient
}

export interface PlanMeetingArgs {
  meetingDate?: string
  objectives?: string[]
  event?: string
  llm?: LLMClient
}

export interface ReflectOnMeetingArgs {
  meetingNotes: string
  missedQuestions?: string[]
  horizonDays?: number
  llm?: LLMClient
}

function resolveClient(llm?: LLMClient): LLMClient {
  return llm ?? new OpenAIChatClient()
}

export async function generateDailyTodo(args: DailyTodoArgs): Promise<Task[]> {
  const today = args.today ?? todayKey()
  const llm = resolveClient(args.llm)
  const scheduleToday = args.schedule.filter((entry) => toDateKey(entry.start) === today)

  const request: DailyTodoRequest = {
    request: 'daily_todo',
    date: today,
    schedule: scheduleToday.map(serializeScheduleEntry),
    donors: args.donors.map(serializeDonor),
    directives: activeDirectives(args.directives),
    guidelines: TODO_GUIDELINES,
  }
  log.info(`Requesting daily to-do for ${today} (${scheduleToday.length} scheduled, ${args.donors.length} donors)`)

  const response = await completeJson(llm, {
    system: TODO_SYSTEM_PROMPT,
    payload: request,
    schema: dailyTodoResponseSchema,
    requiredKeys: DAILY_TODO_KEYS,
  })
  return postProcessTasks(response.tasks.map(taskFromRecord))
}

export async function planMeeting(donor: Donor, args: PlanMeetingArgs = {}): Promise<MeetingPlan> {
  const llm = resolveClient(args.llm)
  const request: MeetingPlanRequest = {
    request: 'meeting_plan',
    meeting_date: args.meetingDate ?? todayKey(),
    donor: serializeDonor(donor),
    fundraiser_objectives: args.objectives ?? [],
    event: args.event ?? null,
    expectations: MEETING_EXPECTATIONS,
  }
  log.info(`Requesting meeting plan for ${donor.name}`)

  const response = await completeJson(llm, {
    system: MEETING_SYSTEM_PROMPT,
    payload: request,
    schema: meetingPlanResponseSchema,
    requiredKeys: MEETING_PLAN_KEYS,
  })
  return meetingPlanFromRecord(response)
}

export async function reflectOnMeeting(donor: Donor, args: ReflectOnMeetingArgs): Promise<MeetingReflection> {
  const llm = resolveClient(args.llm)
  const request: MeetingReflectionRequest = {
    request: 'meeting_reflection',
    donor: serializeDonor(donor),
    meeting_notes: args.meetingNotes,
    missed_questions: args.missedQuestions ?? [],
    follow_up_horizon_days: args.horizonDays,
    expectations: REFLECTION_EXPECTATIONS,
  }
  log.info(`Requesting meeting reflection for ${donor.name}`)

  const response = await completeJson(llm, {
    system: REFLECTION_SYSTEM_PROMPT,
    payload: request,
    schema: meetingReflectionResponseSchema,
    requiredKeys: MEETING_REFLECTION_KEYS,
  })
  return meetingReflectionFromRecord(response)
}
