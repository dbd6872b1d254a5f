import { FocusFlags, FocusKind } from './types'

const FOCUS_PHRASES: Record<FocusKind, readonly string[]> = {
  location: ['los angeles', 'in la'],
  reconnect: ["haven't talked", 'reconnect', 'dormant', 're-engage'],
  disqualify: ['disqualify', 'too long', 'pause outreach', 'stop engaging'],
}

const FOCUS_ORDER: readonly FocusKind[] = ['location', 'reconnect', 'disqualify']

export function activeDirectives(directives: readonly string[] | undefined): string[] {
  return (directives ?? []).map((d) => d.trim()).filter((d) => d.length > 0)
}

export function focusesFor(directive: string): FocusKind[] {
  const text = directive.toLowerCase()
  return FOCUS_ORDER.filter((kind) => FOCUS_PHRASES[kind].some((phrase) => text.includes(phrase)))
}

export function classifyDirectives(directives: readonly string[]): FocusFlags {
  const flags: FocusFlags = {}
  for (const directive of directives) {
    for (const kind of focusesFor(directive)) {
      if (flags[kind] === undefined) flags[kind] = directive
    }
  }
  return flags
}
