import type { ImpactLevel, PlanChange } from '../../model/change.js';
import type { CountedAction, ResourceTypeCounts } from '../../model/summary.js';

/** Display order for per-action groups; `read` changes are not listed. */
export const LISTED_ACTIONS: readonly CountedAction[] = ['create', 'update', 'delete', 'no-op'];

export const ACTION_EMOJI: Readonly<Record<CountedAction, string>> = {
  create: '🟢',
  update: '🟡',
  delete: '🔴',
  'no-op': '⚪',
};

export const IMPACT_EMOJI: Readonly<Record<ImpactLevel, string>> = {
  high: '🔴',
  medium: '🟡',
  low: '🟢',
};

export function plural(count: number, noun: string, pluralNoun = `${noun}s`): string {
  return `${count} ${count === 1 ? noun : pluralNoun}`;
}

export function groupByAction(changes: readonly PlanChange[]): Map<CountedAction, PlanChange[]> {
  const groups = new Map<CountedAction, PlanChange[]>(LISTED_ACTIONS.map(a => [a, []]));
  for (const change of changes) {
    if (change.action === 'read') continue;
    groups.get(change.action)?.push(change);
  }
  return groups;
}

/** "1 create, 2 delete" or "no changes" */
export function describeCounts(counts: Readonly<ResourceTypeCounts>): string {
  const parts = LISTED_ACTIONS.filter(a => counts[a] > 0).map(a => `${counts[a]} ${a}`);
  return parts.length > 0 ? parts.join(', ') : 'no changes';
}
