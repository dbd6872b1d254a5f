import { createInterface } from 'node:readline'
import { DonorNotFoundError, serializeMeetingPlan, serializeMeetingReflection } from '@steward/core'
import { GatewayResponseError } from '@steward/ai'
import { UsageError } from './errors'
import { formatTasks, toJson } from './format'
import {
  PRESET_DIRECTIVES,
  SessionContext,
  SessionState,
  addDirective,
  appendNote,
  appendPledgeReminder,
  clearDirectives,
  commit,
  donorSnapshots,
  generateTodo,
  listDirectives,
  planByEvent,
  reflect,
  resetSession,
} from './session'

export interface DemoIO {
  input: NodeJS.ReadableStream
  print: (text: string) => void
  prompt: (text: string) => void
}

type Ask = (question: string) => Promise<string>

export const WELCOME = `Interactive donor assistant demo.
Reset to see the baseline to-do list, append the pledge reminder to surface pinned deliverables,
then add directives one at a time and regenerate the list after each change.
Type a menu number or keyword. Edits stay in memory until you commit them.`

export const MENU = `
Menu:
  [1] reset       Reload data and show the baseline to-do list
  [2] pledge      Append the pledge reminder to Alicia Gomez's notes
  [3] la          Add directive: "${PRESET_DIRECTIVES.location}"
  [4] catchup     Add directive: "${PRESET_DIRECTIVES.reconnect}"
  [5] disqualify  Add directive: "${PRESET_DIRECTIVES.disqualify}"
  [6] todo        Generate the to-do list with the current context
  [7] event       Plan a meeting from an event description
  [8] reflect     Reflect on meeting notes
  [9] show        Show donor snapshots
  [10] directives Show active directives
  [11] clear      Clear directives
  [12] note       Append a custom note to a donor
  [13] directive  Add a custom directive
  [14] commit     Save donors and schedule back to the data directory
  [quit]          Exit`

const QUIT = new Set(['quit', 'q', 'exit'])

async function showTodo(state: SessionState, context: SessionContext, io: DemoIO): Promise<void> {
  const tasks = await generateTodo(state, context)
  io.print(`\nSuggested to-do list for ${context.today}:\n`)
  io.print(formatTasks(tasks).join('\n'))
}

async function dispatch(
  choice: string,
  state: SessionState,
  context: SessionContext,
  io: DemoIO,
  ask: Ask
): Promise<void> {
  switch (choice) {
    case '1':
    case 'reset':
      io.print(resetSession(state))
      return showTodo(state, context, io)
    case '2':
    case 'pledge':
      io.print(appendPledgeReminder(state))
      return
    case '3':
    case 'la':
      io.print(addDirective(state, PRESET_DIRECTIVES.location))
      return
    case '4':
    case 'catchup':
      io.print(addDirective(state, PRESET_DIRECTIVES.reconnect))
      return
    case '5':
    case 'disqualify':
      io.print(addDirective(state, PRESET_DIRECTIVES.disqualify))
      return
    case '6':
    case 'todo':
      return showTodo(state, context, io)
    case '7':
    case 'event': {
      const description = await ask("Describe the event (include the donor's name): ")
      const plan = await planByEvent(state, description, context)
      io.print(`\nMeeting plan:\n\n${toJson(serializeMeetingPlan(plan))}`)
      return
    }
    case '8':
    case 'reflect': {
      const donorName = await ask('Donor name: ')
      const notes = await ask('Meeting recap / notes: ')
      const missedRaw = await ask('Missed questions (comma-separated, optional): ')
      const missed = missedRaw
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0)
      const reflection = await reflect(state, donorName, notes, missed, context)
      io.print(`\nFollow-up guidance:\n\n${toJson(serializeMeetingReflection(reflection))}`)
      return
    }
    case '9':
    case 'show':
      io.print(donorSnapshots(state).join('\n'))
      return
    case '10':
    case 'directives':
      io.print(listDirectives(state).join('\n'))
      return
    case '11':
    case 'clear':
      io.print(clearDirectives(state))
      return
    case '12':
    case 'note': {
      const donorName = await ask('Donor name: ')
      const note = await ask('Additional note to append: ')
      io.print(appendNote(state, donorName, note))
      return
    }
    case '13':
    case 'directive':
      io.print(addDirective(state, await ask('Directive: ')))
      return
    case '14':
    case 'commit':
      io.print(commit(state))
      return
    default:
      io.print('Unknown option. Please try again.')
  }
}

class InputClosed extends Error {}

/** Menu loop over line input; ends on quit or end of input. */
export async function runDemo(state: SessionState, context: SessionContext, io: DemoIO): Promise<void> {
  const rl = createInterface({ input: io.input, terminal: false })
  const lines = rl[Symbol.asyncIterator]()
  const ask: Ask = async (question) => {
    io.prompt(question)
    const next = await lines.next()
    if (next.done) throw new InputClosed()
    return next.value.trim()
  }

  try {
    io.print(WELCOME)
    for (;;) {
      io.print(MENU)
      const choice = (await ask('Select an option: ')).toLowerCase()
      if (QUIT.has(choice)) break
      try {
        await dispatch(choice, state, context, io, ask)
      } catch (error) {
        if (
          error instanceof UsageError ||
          error instanceof DonorNotFoundError ||
          error instanceof GatewayResponseError
        ) {
          io.print(error.message)
        } else {
          throw error
        }
      }
    }
  } catch (error) {
    if (!(error instanceof InputClosed)) throw error
  } finally {
    rl.close()
  }

  if (state.dirty) io.print('Uncommitted edits were discarded. Choose "commit" next time to keep them.')
  io.print('Goodbye!')
}
