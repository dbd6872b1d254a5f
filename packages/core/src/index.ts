// Domain
export * from './domain/donor'
export * from './domain/schedule'
export * from './domain/task'
export * from './domain/meeting'
export * from './deliverables'

// Data access
export * from './data/loader'

// Prioritization engine
export * from './planner/types'
export * from './planner/directives'
export * from './planner/algorithm'
export { daysSinceLastInteraction } from './planner/rules'
export {
  FLEX_SLOT,
  SLOT_ORDER,
  assignTimeSlots,
  isIsoDate,
  isIsoTimestamp,
  parseDate,
  toClock,
  toDateKey,
  todayKey,
} from './planner/time'

// Meeting heuristics
export * from './meeting/plan'
export * from './meeting/reflection'

// Ambient
export * from './errors'
export * from './env'
export * from './logger'
