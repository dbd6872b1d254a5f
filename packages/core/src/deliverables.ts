// Tracked commitments. A trigger phrase in donor notes pins its deliverables to the top of the day;
// a deliverable keyword missing from a meeting recap is flagged as a missed opportunity.
// Templates substitute {donor} and {keyword}.

export interface TrackedDeliverable {
  keyword: string
  task: string
  pinnedReason: string
  followUpAction: string
}

export interface PinnedCommitment {
  trigger: string
  deliverables: readonly TrackedDeliverable[]
}

export const MENTORSHIP_DELIVERABLES: readonly TrackedDeliverable[] = [
  {
    keyword: 'mentor background checks',
    task: 'Complete mentor background checks for the mentorship pilot',
    pinnedReason:
      '{donor} tied the pledge to seeing these background checks completed before next week. ' +
      'Finish the clearance paperwork and confirm every mentor is approved.',
    followUpAction: 'Finalize and send the cleared mentor background checks so {donor} knows the program is ready.',
  },
  {
    keyword: 'matching roster',
    task: 'Finalize the mentor-mentee matching roster',
    pinnedReason:
      '{donor} wants to review the pairings before signing the pledge. ' +
      'Tighten the roster and flag any gaps in STEM representation.',
    followUpAction: 'Share the complete mentor-mentee roster and highlight STEM pairings to honor the pledge conditions.',
  },
  {
    keyword: 'progress dashboard',
    task: 'Publish the mentorship progress dashboard',
    pinnedReason:
      "Without the updated dashboard {donor} can't verify impact. " +
      'Ship the metrics summary so the pledge can clear by next week.',
    followUpAction: 'Publish the mentorship progress dashboard and include it in your follow-up email.',
  },
]

export const PINNED_COMMITMENTS: readonly PinnedCommitment[] = [
  { trigger: 'mentor background checks', deliverables: MENTORSHIP_DELIVERABLES },
]

export const MISSED_DELIVERABLE_NOTE = "Missed the chance to confirm the {keyword}; {donor}'s pledge depends on seeing this handled."

export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match: string, key: string) => values[key] ?? match)
}
