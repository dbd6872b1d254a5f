import type { Task } from '../domain/task'
import { activeDirectives, classifyDirectives } from './directives'
import {
  RuleContext,
  disqualifyTasks,
  fallbackTask,
  locationTasks,
  pinnedCommitmentTasks,
  reconnectTasks,
  scheduledTasks,
} from './rules'
import { dedupeCandidates, limitUndirected, rankCandidates } from './scoring'
import { SLOT_ORDER, assignTimeSlots } from './time'
import { RankTasksArgs, RankingPreferences } from './types'

export const DEFAULT_RANKING: RankingPreferences = {
  maxTasks: 6,
  reconnectAfterDays: 60,
  slotOrder: SLOT_ORDER,
}

const RULES = [pinnedCommitmentTasks, scheduledTasks, locationTasks, reconnectTasks, disqualifyTasks]

/**
 * Heuristic daily to-do list. Pure over its inputs: the same donors, schedule, date and
 * directives (in the same order) always give the same list.
 */
export function rankTasks(args: RankTasksArgs, preferences: Partial<RankingPreferences> = {}): Task[] {
  const prefs: RankingPreferences = { ...DEFAULT_RANKING, ...preferences }
  const directives = activeDirectives(args.directives)

  const context: RuleContext = {
    donors: args.donors,
    schedule: args.schedule,
    today: args.today,
    directives,
    focus: classifyDirectives(directives),
    reconnectAfterDays: prefs.reconnectAfterDays,
  }

  const candidates = dedupeCandidates(RULES.flatMap((rule) => rule(context)))
  if (candidates.length === 0) candidates.push(fallbackTask())

  let ranked = rankCandidates(candidates, prefs.maxTasks)
  if (directives.length > 0) ranked = limitUndirected(ranked)

  return assignTimeSlots(ranked, prefs.slotOrder).map(({ task, time, reason, relatedDonors }) => ({
    task,
    time,
    reason,
    relatedDonors,
  }))
}
