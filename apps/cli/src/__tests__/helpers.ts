import { copyFileSync, mkdtempSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { Readable } from 'node:stream'
import { HeuristicClient, LLMClient } from '@steward/ai'
import { CliIO } from '../cli'

export const DATA_DIR = join(__dirname, '..', '..', '..', '..', 'data')

export function copyDataDir(): string {
  const dir = mkdtempSync(join(tmpdir(), 'steward-cli-'))
  for (const file of ['donors.json', 'schedule.json']) copyFileSync(join(DATA_DIR, file), join(dir, file))
  return dir
}

const unreachable: LLMClient = {
  complete: async () => {
    throw new Error('The hosted model is not available in tests')
  },
}

export function captureIO(lines: string[] = []) {
  const out: string[] = []
  const err: string[] = []
  const io: CliIO = {
    stdout: (text) => {
      out.push(text)
    },
    stderr: (text) => {
      err.push(text)
    },
    stdin: Readable.from(lines.map((line) => `${line}\n`)),
    createClient: (offline) => (offline ? new HeuristicClient() : unreachable),
  }
  return { io, out, err }
}
