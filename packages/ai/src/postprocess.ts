import { FLEX_SLOT, Task } from '@steward/core'

const CLOCK = /^(\d{1,2}):(\d{2})$/

export function postProcessTasks(tasks: Task[]): Task[] {
  const seen = new Set<string>()
  const result: Task[] = []
  for (const raw of tasks) {
    const task = normalizeTask(raw)
    if (!task.task) continue
    if (seen.has(task.task)) continue
    seen.add(task.task)
    result.push(task)
  }
  return result
}

export function normalizeTask(task: Task): Task {
  return {
    task: task.task.trim(),
    time: normalizeClock(task.time),
    reason: task.reason.trim(),
    relatedDonors: normalizeRelatedDonors(task.relatedDonors),
  }
}

// Models answer "9:30", "09:30" or "anytime"; only real clock times survive
export function normalizeClock(value: string): string {
  const match = CLOCK.exec(value.trim())
  if (!match) return FLEX_SLOT
  const hours = Number(match[1])
  const minutes = Number(match[2])
  if (hours > 23 || minutes > 59) return FLEX_SLOT
  return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`
}

export function normalizeRelatedDonors(names: string[]): string[] {
  return Array.from(new Set(names.map((n) => n.trim()).filter((n) => n.length > 0)))
}
