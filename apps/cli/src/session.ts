import { join } from 'node:path'
import {
  Donor,
  DonorNotFoundError,
  MeetingPlan,
  MeetingReflection,
  ScheduleEntry,
  Task,
  appendDonorNote,
  findDonor,
  inferDonorFromText,
  loadDonors,
  loadSchedule,
  saveDonors,
  saveSchedule,
} from '@steward/core'
import { LLMClient, generateDailyTodo, planMeeting, reflectOnMeeting } from '@steward/ai'
import { UsageError } from './errors'

export const DEMO_DATE = '2024-03-25'
export const DEMO_HORIZON_DAYS = 5
export const DEMO_OBJECTIVES = ['Confirm mentorship deliverables are ready', 'Discuss LA alumni mixer logistics']

export const PLEDGE_DONOR = 'Alicia Gomez'
export const PLEDGE_REMINDER =
  'She said if I can finalize the mentor background checks, confirm the mentor-mentee matching roster, and send ' +
  'her the updated mentorship progress dashboard by next week, then she will donate 100,000 dollars.'

export const PRESET_DIRECTIVES = {
  location: 'I am in LA right now, find some clients that might be in LA too so I can catch up with them',
  reconnect: "Find someone that I haven't talked to for a while but I should",
  disqualify:
    'Find someone I have been talking to for too long and might not be interested in donating, so I can disqualify them',
} as const

export interface SessionState {
  dataDir: string
  donors: Donor[]
  schedule: ScheduleEntry[]
  directives: string[]
  // Set by edits that have not been committed back to dataDir
  dirty: boolean
}

export interface SessionContext {
  llm: LLMClient
  today: string
}

function donorsPath(dataDir: string): string {
  return join(dataDir, 'donors.json')
}

function schedulePath(dataDir: string): string {
  return join(dataDir, 'schedule.json')
}

export function openSession(dataDir: string): SessionState {
  return {
    dataDir,
    donors: loadDonors(donorsPath(dataDir)),
    schedule: loadSchedule(schedulePath(dataDir)),
    directives: [],
    dirty: false,
  }
}

export function resetSession(state: SessionState): string {
  state.donors = loadDonors(donorsPath(state.dataDir))
  state.schedule = loadSchedule(schedulePath(state.dataDir))
  state.directives = []
  state.dirty = false
  return `Reloaded ${state.donors.length} donors and ${state.schedule.length} schedule entries from ${state.dataDir}.`
}

export function addDirective(state: SessionState, directive: string): string {
  const text = directive.trim()
  if (!text) throw new UsageError('Directive is empty.')
  if (state.directives.includes(text)) return `Directive already active: ${text}`
  state.directives.push(text)
  return `Added directive: ${text}`
}

export function clearDirectives(state: SessionState): string {
  state.directives = []
  return 'Cleared all directives.'
}

export function listDirectives(state: SessionState): string[] {
  if (state.directives.length === 0) return ['No active directives.']
  return ['Active directives:', ...state.directives.map((d) => `- ${d}`)]
}

function requireDonor(state: SessionState, name: string): Donor {
  const donor = findDonor(state.donors, name)
  if (!donor) throw new DonorNotFoundError(name.trim())
  return donor
}

export function appendNote(state: SessionState, donorName: string, note: string): string {
  const donor = requireDonor(state, donorName)
  if (!note.trim()) throw new UsageError('Note is empty.')
  appendDonorNote(donor, note)
  state.dirty = true
  return `Updated notes for ${donor.name}.`
}

export function appendPledgeReminder(state: SessionState): string {
  return appendNote(state, PLEDGE_DONOR, PLEDGE_REMINDER)
}

export async function generateTodo(state: SessionState, context: SessionContext): Promise<Task[]> {
  return generateDailyTodo({
    donors: state.donors,
    schedule: state.schedule,
    today: context.today,
    directives: state.directives,
    llm: context.llm,
  })
}

export async function planByEvent(state: SessionState, description: string, context: SessionContext): Promise<MeetingPlan> {
  const event = description.trim()
  if (!event) throw new UsageError("Please provide an event description (e.g. 'Meet Alicia Gomez at Gala 2025').")
  const donor = inferDonorFromText(state.donors, event)
  if (!donor) {
    throw new UsageError('Could not infer a donor from that event description. Try including their full name.')
  }
  return planMeeting(donor, { meetingDate: context.today, objectives: DEMO_OBJECTIVES, event, llm: context.llm })
}

export async function reflect(
  state: SessionState,
  donorName: string,
  meetingNotes: string,
  missedQuestions: string[],
  context: SessionContext
): Promise<MeetingReflection> {
  const donor = requireDonor(state, donorName)
  return reflectOnMeeting(donor, {
    meetingNotes,
    missedQuestions,
    horizonDays: DEMO_HORIZON_DAYS,
    llm: context.llm,
  })
}

export function donorSnapshots(state: SessionState): string[] {
  const lines: string[] = []
  for (const donor of state.donors) {
    const latest = donor.interactions.map((i) => i.date).sort().pop() ?? 'No interactions yet'
    lines.push(`- ${donor.name} (${donor.primaryCity ?? 'Unknown city'}, ${donor.status})`)
    lines.push(`  Last interaction: ${latest}`)
    lines.push(`  Notes: ${donor.notes}`)
  }
  return lines
}

export function commit(state: SessionState): string {
  saveDonors(donorsPath(state.dataDir), state.donors)
  saveSchedule(schedulePath(state.dataDir), state.schedule)
  state.dirty = false
  return `Saved ${state.donors.length} donors and ${state.schedule.length} schedule entries to ${state.dataDir}.`
}
