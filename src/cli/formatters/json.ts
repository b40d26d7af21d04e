import type { PlanSummary } from '../../model/summary.js';

// Keys mirror the snake_case of the plan document so the output can be piped
// into the same tooling.
export function formatJson(summary: PlanSummary): string {
  return JSON.stringify({
    overview: {
      total_resources: summary.totalResources,
      resources_to_create: summary.resourcesToCreate,
      resources_to_update: summary.resourcesToUpdate,
      resources_to_delete: summary.resourcesToDelete,
      resources_no_change: summary.resourcesNoChange,
    },
    resource_breakdown: Object.fromEntries(summary.resourceBreakdown),
    impact_analysis: {
      high: summary.impactAnalysis.high,
      medium: summary.impactAnalysis.medium,
      low: summary.impactAnalysis.low,
    },
    changes: summary.changes.map(c => ({
      address: c.address,
      resource_type: c.resourceType,
      resource_name: c.resourceName,
      action: c.action,
      impact_level: c.impactLevel,
      replacement_fields: c.replacementFields,
    })),
  }, null, 2);
}
