import type { ImpactLevel, PlanChange } from '../model/change.js';
import { ResourceBreakdown, type PlanSummary, type ResourceTypeCounts } from '../model/summary.js';
import type { RawPlan } from './schema.js';
import { normalizeChange } from './normalizer.js';

export function emptyTypeCounts(): ResourceTypeCounts {
  return { total: 0, create: 0, update: 0, delete: 0, 'no-op': 0 };
}

/**
 * Reduces normalized changes into a summary in one pass.
 *
 * A `read` change is counted in `totalResources` and in its type's `total`,
 * but in none of the action buckets.
 */
export function summarizePlan(changes: readonly PlanChange[]): PlanSummary {
  let create = 0, update = 0, del = 0, noop = 0;
  const impact: Record<ImpactLevel, number> = { high: 0, medium: 0, low: 0 };
  const breakdown = new Map<string, ResourceTypeCounts>();

  for (const c of changes) {
    let counts = breakdown.get(c.resourceType);
    if (!counts) {
      counts = emptyTypeCounts();
      breakdown.set(c.resourceType, counts);
    }
    counts.total++;
    impact[c.impactLevel]++;

    switch (c.action) {
      case 'create': create++; counts.create++; break;
      case 'update': update++; counts.update++; break;
      case 'delete': del++; counts.delete++; break;
      case 'no-op': noop++; counts['no-op']++; break;
      case 'read': break;
    }
  }

  return Object.freeze({
    totalResources: changes.length,
    resourcesToCreate: create,
    resourcesToUpdate: update,
    resourcesToDelete: del,
    resourcesNoChange: noop,
    resourceBreakdown: new ResourceBreakdown(breakdown),
    impactAnalysis: Object.freeze(impact),
    changes: Object.freeze([...changes]),
  });
}

export function analyzePlan(plan: RawPlan): PlanSummary {
  const raw = plan.resource_changes ?? [];
  return summarizePlan(raw.map(normalizeChange));
}
