import { Task } from '@steward/core'

export function toJson(value: unknown): string {
  return JSON.stringify(value, null, 2)
}

export function formatTasks(tasks: Task[]): string[] {
  if (tasks.length === 0) return ['Nothing to do today.']
  return tasks.flatMap((task, index) => {
    const donors = task.relatedDonors.join(', ') || 'general'
    return [`${index + 1}. [${task.time}] ${task.task} (${donors})`, `   -> ${task.reason}`]
  })
}
