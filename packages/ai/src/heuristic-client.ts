import {
  buildMeetingPlan,
  buildMeetingReflection,
  donorFromRecord,
  rankTasks,
  scheduleEntryFromRecord,
  serializeMeetingPlan,
  serializeMeetingReflection,
  serializeTask,
} from '@steward/core'
import { ChatMessage, CompleteOptions, LLMClient } from './client'
import { ParsedAssistantRequest, assistantRequestSchema } from './schemas'

/**
 * Offline stand-in for the hosted model. Reads the tagged request from the last user
 * message and answers it with the rule-based planners, so the same gateway code path
 * runs with or without network access.
 */
export class HeuristicClient implements LLMClient {
  readonly requests: ParsedAssistantRequest[] = []

  async complete(messages: ChatMessage[], options: CompleteOptions = {}): Promise<string> {
    if (options.responseFormat !== 'json_object') {
      throw new Error('HeuristicClient only answers JSON requests')
    }
    const last = messages[messages.length - 1]
    if (!last || last.role !== 'user') {
      throw new Error('Expected the request payload in a final user message')
    }
    const request = assistantRequestSchema.parse(JSON.parse(last.content))
    this.requests.push(request)
    return JSON.stringify(answer(request))
  }
}

function answer(request: ParsedAssistantRequest): unknown {
  switch (request.request) {
    case 'daily_todo': {
      const tasks = rankTasks({
        donors: request.donors.map(donorFromRecord),
        schedule: request.schedule.map(scheduleEntryFromRecord),
        today: request.date,
        directives: request.directives,
      })
      return { tasks: tasks.map(serializeTask) }
    }
    case 'meeting_plan': {
      const plan = buildMeetingPlan(donorFromRecord(request.donor), {
        meetingDate: request.meeting_date,
        objectives: request.fundraiser_objectives,
        event: request.event ?? undefined,
      })
      return serializeMeetingPlan(plan)
    }
    case 'meeting_reflection': {
      const reflection = buildMeetingReflection(donorFromRecord(request.donor), {
        meetingNotes: request.meeting_notes,
        missedQuestions: request.missed_questions,
        horizonDays: request.follow_up_horizon_days,
      })
      return serializeMeetingReflection(reflection)
    }
  }
}
