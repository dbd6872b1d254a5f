import { TaskCandidate } from './types'

// First occurrence of a task description wins; later duplicates are dropped
export function dedupeCandidates(candidates: readonly TaskCandidate[]): TaskCandidate[] {
  const seen = new Set<string>()
  const out: TaskCandidate[] = []
  for (const candidate of candidates) {
    if (seen.has(candidate.task)) continue
    seen.add(candidate.task)
    out.push(candidate)
  }
  return out
}

// Tier ascending, then first-seen order; truncated to maxTasks
export function rankCandidates(candidates: readonly TaskCandidate[], maxTasks: number): TaskCandidate[] {
  return candidates
    .map((candidate, index) => ({ candidate, index }))
    .sort((a, b) => a.candidate.tier - b.candidate.tier || a.index - b.index)
    .slice(0, Math.max(0, maxTasks))
    .map(({ candidate }) => candidate)
}

// Under explicit directives, donor-specific work wins: keep only the best-ranked task without a related donor
export function limitUndirected(ranked: readonly TaskCandidate[]): TaskCandidate[] {
  let keptGeneral = false
  return ranked.filter((candidate) => {
    if (candidate.relatedDonors.length > 0) return true
    if (keptGeneral) return false
    keptGeneral = true
    return true
  })
}
