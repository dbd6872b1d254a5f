import { z } from 'zod'

export interface Task {
  task: string
  time: string // "HH:MM", or a sentinel such as "flex" from a model
  reason: string
  relatedDonors: string[]
}

export const taskRecordSchema = z.object({
  task: z.string(),
  time: z.string(),
  reason: z.string(),
  related_donors: z.array(z.string()).default([]),
})

export type TaskRecord = z.input<typeof taskRecordSchema>

export function parseTask(input: unknown): Task {
  return taskFromRecord(taskRecordSchema.parse(input))
}

export function taskFromRecord(record: z.output<typeof taskRecordSchema>): Task {
  return { task: record.task, time: record.time, reason: record.reason, relatedDonors: record.related_donors }
}

export function serializeTask(task: Task): TaskRecord {
  return { task: task.task, time: task.time, reason: task.reason, related_donors: [...task.relatedDonors] }
}
