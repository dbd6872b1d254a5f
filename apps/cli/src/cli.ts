import { join } from 'node:path'
import { parseArgs } from 'node:util'
import {
  DataFormatError,
  DonorNotFoundError,
  createLogger,
  findDonor,
  isIsoDate,
  loadDonors,
  loadEnv,
  loadSchedule,
  serializeMeetingPlan,
  serializeMeetingReflection,
  serializeTask,
  todayKey,
} from '@steward/core'
import {
  GatewayResponseError,
  HeuristicClient,
  LLMClient,
  MissingApiKeyError,
  OpenAIChatClient,
  generateDailyTodo,
  planMeeting,
  reflectOnMeeting,
} from '@steward/ai'
import { runDemo } from './demo'
import { UsageError } from './errors'
import { toJson } from './format'
import { DEMO_DATE, openSession } from './session'

const log = createLogger('cli')

export const COMMANDS = ['todo', 'plan', 'reflect', 'demo'] as const

type Command = typeof COMMANDS[number]

export const USAGE = `Usage: steward [data-root] <command> [options]

Commands:
  todo                      Prioritized to-do list for a day
      --date YYYY-MM-DD     Day to plan (default: today)
      --directive TEXT      Focus for the day; repeatable
  plan <donor name>         Meeting plan for a donor
      --date YYYY-MM-DD     Meeting date (default: today)
      --objective TEXT      Fundraiser objective; repeatable
      --event TEXT          Event the meeting happens at
  reflect <donor name>      Follow-up guidance from meeting notes
      --notes TEXT          Meeting recap (required)
      --missed-question TEXT  Question you meant to ask; repeatable
      --horizon N           Days to finish follow-ups (default: 7)
  demo                      Interactive walkthrough over the data directory

Options:
  --offline                 Answer with the built-in heuristics instead of the hosted model
  -h, --help                Show this message

data-root holds donors.json and schedule.json (default: $STEWARD_DATA_ROOT or ./data).`

export interface CliIO {
  stdout: (text: string) => void
  stderr: (text: string) => void
  stdin: NodeJS.ReadableStream
  createClient: (offline: boolean) => LLMClient
}

export function createClient(offline: boolean): LLMClient {
  return offline ? new HeuristicClient() : new OpenAIChatClient()
}

export const defaultIO: CliIO = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
  stdin: process.stdin,
  createClient,
}

const OPTIONS = {
  date: { type: 'string' },
  directive: { type: 'string', multiple: true },
  objective: { type: 'string', multiple: true },
  event: { type: 'string' },
  notes: { type: 'string' },
  'missed-question': { type: 'string', multiple: true },
  horizon: { type: 'string' },
  offline: { type: 'boolean', default: false },
  help: { type: 'boolean', short: 'h', default: false },
} as const

type OptionName = keyof typeof OPTIONS

const GLOBAL_OPTIONS: readonly OptionName[] = ['offline', 'help']

const COMMAND_OPTIONS: Record<Command, readonly OptionName[]> = {
  todo: ['date', 'directive'],
  plan: ['date', 'objective', 'event'],
  reflect: ['notes', 'missed-question', 'horizon'],
  demo: ['date'],
}

function parse(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true })
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error))
  }
}

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((command) => command === value)
}

function parseDateOption(value: string | undefined, fallback: string): string {
  if (value === undefined) return fallback
  if (!isIsoDate(value)) throw new UsageError(`Invalid --date "${value}": expected YYYY-MM-DD`)
  return value
}

function parseHorizon(value: string | undefined): number | undefined {
  if (value === undefined) return undefined
  const days = /^\d+$/.test(value) ? Number(value) : NaN
  if (!Number.isSafeInteger(days) || days < 1) {
    throw new UsageError(`Invalid --horizon "${value}": expected a positive whole number of days`)
  }
  return days
}

function checkOptions(command: Command, values: Record<string, unknown>): void {
  const allowed = [...GLOBAL_OPTIONS, ...COMMAND_OPTIONS[command]]
  for (const [name, value] of Object.entries(values)) {
    if (value === undefined || allowed.some((option) => option === name)) continue
    throw new UsageError(`Option --${name} does not apply to "${command}"`)
  }
}

function requireName(rest: string[], command: Command): string {
  const name = rest.join(' ').trim()
  if (!name) throw new UsageError(`Missing donor name for "${command}"`)
  return name
}

async function execute(argv: string[], io: CliIO): Promise<void> {
  const { values, positionals } = parse(argv)
  const offline = values.offline === true
  if (values.help === true) {
    io.stdout(USAGE)
    return
  }

  // The data root may be left out, in which case the first positional is the command
  const leadingCommand = isCommand(positionals[0])
  const dataRoot = leadingCommand ? loadEnv().STEWARD_DATA_ROOT : positionals[0]
  const command = leadingCommand ? positionals[0] : positionals[1]
  const rest = positionals.slice(leadingCommand ? 1 : 2)
  if (dataRoot === undefined) throw new UsageError('Missing data root and command')
  if (command === undefined) throw new UsageError('Missing command')
  if (!isCommand(command)) throw new UsageError(`Unknown command "${command}"`)
  checkOptions(command, values)

  log.debug(`Running "${command}" against ${dataRoot}`)
  const donorsFile = join(dataRoot, 'donors.json')
  const scheduleFile = join(dataRoot, 'schedule.json')

  switch (command) {
    case 'todo': {
      if (rest.length > 0) throw new UsageError(`Unexpected argument "${rest.join(' ')}" for "todo"`)
      const today = parseDateOption(values.date, todayKey())
      const donors = loadDonors(donorsFile)
      const schedule = loadSchedule(scheduleFile)
      const tasks = await generateDailyTodo({
        donors,
        schedule,
        today,
        directives: values.directive,
        llm: io.createClient(offline),
      })
      io.stdout(toJson(tasks.map(serializeTask)))
      return
    }
    case 'plan': {
      const name = requireName(rest, command)
      const meetingDate = parseDateOption(values.date, todayKey())
      const donor = findDonor(loadDonors(donorsFile), name)
      if (!donor) throw new DonorNotFoundError(name)
      const plan = await planMeeting(donor, {
        meetingDate,
        objectives: values.objective,
        event: values.event,
        llm: io.createClient(offline),
      })
      io.stdout(toJson(serializeMeetingPlan(plan)))
      return
    }
    case 'reflect': {
      const name = requireName(rest, command)
      const notes = values.notes?.trim()
      if (!notes) throw new UsageError('Missing --notes for "reflect"')
      const horizonDays = parseHorizon(values.horizon)
      const donor = findDonor(loadDonors(donorsFile), name)
      if (!donor) throw new DonorNotFoundError(name)
      const reflection = await reflectOnMeeting(donor, {
        meetingNotes: notes,
        missedQuestions: values['missed-question'],
        horizonDays,
        llm: io.createClient(offline),
      })
      io.stdout(toJson(serializeMeetingReflection(reflection)))
      return
    }
    case 'demo': {
      if (rest.length > 0) throw new UsageError(`Unexpected argument "${rest.join(' ')}" for "demo"`)
      const state = openSession(dataRoot)
      const context = { llm: io.createClient(offline), today: parseDateOption(values.date, DEMO_DATE) }
      await runDemo(state, context, {
        input: io.stdin,
        print: io.stdout,
        prompt: (text) => io.stdout(text),
      })
      return
    }
  }
}

/** Runs one command and resolves to the process exit code. */
export async function run(argv: string[], io: CliIO = defaultIO): Promise<number> {
  try {
    await execute(argv, io)
    return 0
  } catch (error) {
    if (error instanceof UsageError || error instanceof DonorNotFoundError) {
      io.stderr(`error: ${error.message}`)
      io.stderr(`Run "steward --help" for usage.`)
      return 2
    }
    if (
      error instanceof DataFormatError ||
      error instanceof GatewayResponseError ||
      error instanceof MissingApiKeyError
    ) {
      io.stderr(`error: ${error.message}`)
      log.debug(error.stack ?? error.message)
      return 1
    }
    log.error('Unexpected failure', error)
    return 1
  }
}
