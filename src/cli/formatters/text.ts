import type { PlanSummary } from '../../model/summary.js';
import { ACTION_EMOJI, IMPACT_EMOJI, describeCounts, groupByAction, plural } from './shared.js';

export interface TextFormatOptions {
  detailed?: boolean;
}

function formatBasic(summary: PlanSummary): string[] {
  const lines = [
    '📋 Terraform Plan Summary',
    '='.repeat(40),
    '',
    '🔍 Overview:',
    `  • Total Resources: ${summary.totalResources}`,
    `  • To Create: ${summary.resourcesToCreate}`,
    `  • To Update: ${summary.resourcesToUpdate}`,
    `  • To Delete: ${summary.resourcesToDelete}`,
    `  • No Changes: ${summary.resourcesNoChange}`,
    '',
  ];

  if (summary.resourceBreakdown.size > 0) {
    lines.push('📊 Resource Breakdown:');
    for (const [resourceType, counts] of summary.resourceBreakdown) {
      lines.push(`  • ${resourceType}: ${plural(counts.total, 'resource')} (${describeCounts(counts)})`);
    }
    lines.push('');
  }

  const { high, medium, low } = summary.impactAnalysis;
  lines.push(
    '⚠️  Potential Impact:',
    `  • High Impact: ${plural(high, 'resource')} (deletions/replacements)`,
    `  • Medium Impact: ${plural(medium, 'resource')} (updates)`,
    `  • Low Impact: ${plural(low, 'resource')} (creations/no changes)`,
  );
  return lines;
}

function formatDetails(summary: PlanSummary): string[] {
  const lines = ['🔍 Detailed Resource Changes:'];
  for (const [action, changes] of groupByAction(summary.changes)) {
    if (changes.length === 0) continue;
    lines.push('', `${ACTION_EMOJI[action]} ${action.toUpperCase()} (${plural(changes.length, 'resource')}):`);
    for (const change of changes) {
      lines.push(`  ${IMPACT_EMOJI[change.impactLevel]} ${change.address}`);
    }
  }
  return lines;
}

export function formatText(summary: PlanSummary, opts: TextFormatOptions = {}): string {
  const lines = formatBasic(summary);
  if (opts.detailed) {
    lines.push('', '='.repeat(60), '', ...formatDetails(summary));
  }
  return lines.join('\n');
}
