import { DonorNotFoundError, loadDonors } from '@steward/core'
import { HeuristicClient } from '@steward/ai'
import { join } from 'node:path'
import { UsageError } from '../errors'
import {
  DEMO_DATE,
  PLEDGE_REMINDER,
  PRESET_DIRECTIVES,
  SessionContext,
  addDirective,
  appendNote,
  appendPledgeReminder,
  clearDirectives,
  commit,
  donorSnapshots,
  generateTodo,
  listDirectives,
  openSession,
  planByEvent,
  reflect,
  resetSession,
} from '../session'
import { copyDataDir } from './helpers'

function context(): SessionContext {
  return { llm: new HeuristicClient(), today: DEMO_DATE }
}

describe('demo session', () => {
  it('tracks directives without duplicates', () => {
    const state = openSession(copyDataDir())

    expect(listDirectives(state)).toEqual(['No active directives.'])
    expect(addDirective(state, ` ${PRESET_DIRECTIVES.location} `)).toBe(`Added directive: ${PRESET_DIRECTIVES.location}`)
    expect(addDirective(state, PRESET_DIRECTIVES.location)).toBe(
      `Directive already active: ${PRESET_DIRECTIVES.location}`
    )
    expect(() => addDirective(state, '   ')).toThrow(UsageError)
    expect(listDirectives(state)).toEqual(['Active directives:', `- ${PRESET_DIRECTIVES.location}`])
    expect(clearDirectives(state)).toBe('Cleared all directives.')
    expect(state.directives).toEqual([])
  })

  it('pins the pledge deliverables once the reminder is on file', async () => {
    const state = openSession(copyDataDir())
    expect(appendPledgeReminder(state)).toBe('Updated notes for Alicia Gomez.')
    expect(state.dirty).toBe(true)

    const tasks = await generateTodo(state, context())

    expect(tasks.map((t) => [t.task, t.time])).toEqual([
      ['Complete mentor background checks for the mentorship pilot', '08:00'],
      ['Finalize the mentor-mentee matching roster', '09:30'],
      ['Publish the mentorship progress dashboard', '10:45'],
      ['Prep briefing for Alicia Gomez', '12:00'],
      ['Prep briefing for Cara Lee', '15:00'],
      ['Prepare for Program team standup', '09:00'],
    ])
  })

  it('reports unknown donors', () => {
    const state = openSession(copyDataDir())
    expect(() => appendNote(state, 'Nobody', 'Hello')).toThrow(DonorNotFoundError)
    expect(state.dirty).toBe(false)
  })

  it('plans from an event description naming the donor', async () => {
    const state = openSession(copyDataDir())
    const plan = await planByEvent(state, 'Meet alicia gomez at Gala 2025', context())

    expect(plan.event).toBe('Meet alicia gomez at Gala 2025')
    expect(plan.meetingFormat.endsWith(`on ${DEMO_DATE}`)).toBe(true)
    expect(plan.discussionTopics.slice(-2)).toEqual([
      'Confirm mentorship deliverables are ready',
      'Discuss LA alumni mixer logistics',
    ])
  })

  it('rejects event descriptions without a known donor', async () => {
    const state = openSession(copyDataDir())
    await expect(planByEvent(state, 'Board retreat', context())).rejects.toThrow(
      'Could not infer a donor from that event description. Try including their full name.'
    )
    await expect(planByEvent(state, '  ', context())).rejects.toBeInstanceOf(UsageError)
  })

  it('reflects with the demo horizon', async () => {
    const state = openSession(copyDataDir())
    const reflection = await reflect(state, 'Cara Lee', 'Quick call about the spring report.', [], context())
    expect(reflection.updatedTimeline.startsWith('Complete the follow-ups within the next 5 days')).toBe(true)
    await expect(reflect(state, 'Nobody', 'Notes', [], context())).rejects.toBeInstanceOf(DonorNotFoundError)
  })

  it('summarizes donors by their latest interaction', () => {
    const state = openSession(copyDataDir())
    expect(donorSnapshots(state).slice(0, 2)).toEqual(['- Alicia Gomez (Los Angeles, active)', '  Last interaction: 2024-03-01'])
  })

  it('keeps edits in memory until commit', () => {
    const dir = copyDataDir()
    const state = openSession(dir)
    appendPledgeReminder(state)

    const onDisk = () => loadDonors(join(dir, 'donors.json')).find((d) => d.name === 'Alicia Gomez')?.notes ?? ''
    expect(onDisk().includes(PLEDGE_REMINDER)).toBe(false)

    expect(commit(state)).toBe(`Saved 5 donors and 5 schedule entries to ${dir}.`)
    expect(state.dirty).toBe(false)
    expect(onDisk().endsWith(PLEDGE_REMINDER)).toBe(true)
  })

  it('discards uncommitted edits on reset', () => {
    const state = openSession(copyDataDir())
    appendPledgeReminder(state)
    addDirective(state, PRESET_DIRECTIVES.reconnect)

    expect(resetSession(state)).toBe(`Reloaded 5 donors and 5 schedule entries from ${state.dataDir}.`)
    expect(state.dirty).toBe(false)
    expect(state.directives).toEqual([])
    expect(state.donors.find((d) => d.name === 'Alicia Gomez')?.notes.includes(PLEDGE_REMINDER)).toBe(false)
  })
})
