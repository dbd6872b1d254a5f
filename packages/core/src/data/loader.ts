import { readFileSync, writeFileSync } from 'node:fs'
import { ZodError } from 'zod'
import { Donor, parseDonor, serializeDonor } from '../domain/donor'
import { ScheduleEntry, parseScheduleEntry, serializeScheduleEntry } from '../domain/schedule'
import { DataFormatError } from '../errors'
import { createLogger } from '../logger'
import { isSameIsoWeek } from '../planner/time'

const log = createLogger('data')

export interface LoadScheduleOptions {
  // Keep only entries in the same ISO week as this YYYY-MM-DD date
  weekOf?: string
}

function readCollection(path: string): unknown[] {
  let raw: string
  try {
    raw = readFileSync(path, 'utf8')
  } catch (error) {
    throw new DataFormatError(`Cannot read ${path}`, path, { cause: error })
  }
  let payload: unknown
  try {
    payload = JSON.parse(raw)
  } catch (error) {
    throw new DataFormatError(`Malformed JSON in ${path}`, path, { cause: error })
  }
  if (Array.isArray(payload)) return payload
  if (payload !== null && typeof payload === 'object' && 'items' in payload && Array.isArray(payload.items)) {
    return payload.items
  }
  throw new DataFormatError(`Unsupported JSON schema in ${path}`, path)
}

function parseEach<T>(path: string, items: unknown[], parse: (item: unknown) => T): T[] {
  return items.map((item, index) => {
    try {
      return parse(item)
    } catch (error) {
      if (error instanceof ZodError) {
        const detail = error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')
        throw new DataFormatError(`Invalid record #${index} in ${path}: ${detail}`, path, { cause: error })
      }
      throw error
    }
  })
}

export function loadDonors(path: string): Donor[] {
  const donors = parseEach(path, readCollection(path), parseDonor)
  log.debug(`Loaded ${donors.length} donor(s) from ${path}`)
  return donors
}

export function loadSchedule(path: string, options: LoadScheduleOptions = {}): ScheduleEntry[] {
  const schedule = parseEach(path, readCollection(path), parseScheduleEntry)
  log.debug(`Loaded ${schedule.length} schedule entr${schedule.length === 1 ? 'y' : 'ies'} from ${path}`)
  const { weekOf } = options
  if (!weekOf) return schedule
  return schedule.filter((entry) => isSameIsoWeek(entry.start, weekOf))
}

export function saveDonors(path: string, donors: Donor[]): void {
  log.info(`Writing ${donors.length} donor(s) to ${path}`)
  writeFileSync(path, `${JSON.stringify(donors.map(serializeDonor), null, 2)}\n`, 'utf8')
}

export function saveSchedule(path: string, schedule: ScheduleEntry[]): void {
  log.info(`Writing ${schedule.length} schedule entries to ${path}`)
  writeFileSync(path, `${JSON.stringify(schedule.map(serializeScheduleEntry), null, 2)}\n`, 'utf8')
}

export function findDonor(donors: Iterable<Donor>, name: string): Donor | undefined {
  const key = name.trim().toLowerCase()
  for (const donor of donors) {
    if (donor.name.toLowerCase() === key) return donor
  }
  return undefined
}

/** First donor whose full name appears anywhere in the text, case-insensitively. */
export function inferDonorFromText(donors: Iterable<Donor>, text: string): Donor | undefined {
  const lowered = text.toLowerCase()
  for (const donor of donors) {
    if (lowered.includes(donor.name.toLowerCase())) return donor
  }
  return undefined
}
