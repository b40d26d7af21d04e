import type { CountedAction, PlanSummary } from '../../model/summary.js';
import { groupByAction, plural } from './shared.js';

export interface NarrativeFormatOptions {
  detailed?: boolean;
}

/** "a", "a and b", "a, b, and c" */
function joinClauses(clauses: readonly string[]): string {
  if (clauses.length <= 1) return clauses.join('');
  if (clauses.length === 2) return `${clauses[0]} and ${clauses[1]}`;
  return `${clauses.slice(0, -1).join(', ')}, and ${clauses[clauses.length - 1]}`;
}

function willBe(count: number, noun: string, verb: string): string {
  return `${plural(count, noun)} will ${verb}`;
}

export function describeOverview(summary: PlanSummary): string {
  if (summary.totalResources === 0) {
    return 'No changes are planned. Your infrastructure is already in the desired state.';
  }

  const reads = summary.totalResources - summary.resourcesToCreate - summary.resourcesToUpdate
    - summary.resourcesToDelete - summary.resourcesNoChange;

  const clauses: string[] = [];
  if (summary.resourcesToCreate > 0) clauses.push(willBe(summary.resourcesToCreate, 'new resource', 'be created'));
  if (summary.resourcesToUpdate > 0) clauses.push(willBe(summary.resourcesToUpdate, 'existing resource', 'be modified'));
  if (summary.resourcesToDelete > 0) clauses.push(willBe(summary.resourcesToDelete, 'resource', 'be destroyed'));
  if (summary.resourcesNoChange > 0) clauses.push(willBe(summary.resourcesNoChange, 'resource', 'remain unchanged'));
  if (reads > 0) clauses.push(willBe(reads, 'data source', 'be read'));

  return `In total, ${joinClauses(clauses)}.`;
}

const BREAKDOWN_NOUNS: ReadonlyArray<[CountedAction, string]> = [
  ['create', 'creation'],
  ['update', 'update'],
  ['delete', 'deletion'],
  ['no-op', 'no-change'],
];

export function describeBreakdown(summary: PlanSummary): string {
  const lines = ['Resource Changes by Type:'];
  for (const [resourceType, counts] of summary.resourceBreakdown) {
    const parts = BREAKDOWN_NOUNS
      .filter(([action]) => counts[action] > 0)
      .map(([action, noun]) => plural(counts[action], noun));
    const detail = parts.length > 0 ? parts.join(', ') : 'no changes';
    lines.push(`  • ${resourceType}: ${plural(counts.total, 'resource')} (${detail})`);
  }
  return lines.join('\n');
}

export function describeImpact(summary: PlanSummary): string {
  const { high, medium, low } = summary.impactAnalysis;
  const lines = ['Impact Assessment:'];

  if (high > 0) lines.push(`  • High Impact: ${willBe(high, 'resource', 'be destroyed or replaced')}`);
  if (medium > 0) lines.push(`  • Medium Impact: ${willBe(medium, 'resource', 'be modified in place')}`);
  if (low > 0) lines.push(`  • Low Impact: ${plural(low, 'resource')} with no destructive change`);

  if (high > 0) {
    const subject = high === 1
      ? 'the resource that will be destroyed or replaced'
      : `the ${high} resources that will be destroyed or replaced`;
    lines.push(
      '',
      '⚠️  Recommendations:',
      `  • Review ${subject} to ensure no data loss`,
      '  • Consider backing up any important data before applying',
    );
  }
  return lines.join('\n');
}

const DETAIL_HEADINGS: Readonly<Record<CountedAction, string>> = {
  create: 'Resources to be Created:',
  update: 'Resources to be Modified:',
  delete: 'Resources to be Destroyed:',
  'no-op': 'Resources with No Changes:',
};

function describeAction(action: CountedAction, resourceType: string): string {
  switch (action) {
    case 'create': return `This will create a new ${resourceType} resource.`;
    case 'update': return `This will update the existing ${resourceType} resource.`;
    case 'delete': return `This will permanently delete the ${resourceType} resource.`;
    case 'no-op': return `This ${resourceType} resource will remain unchanged.`;
  }
}

export function describeChanges(summary: PlanSummary): string {
  const lines = ['Detailed Changes:', '='.repeat(30)];
  for (const [action, changes] of groupByAction(summary.changes)) {
    if (changes.length === 0) continue;
    lines.push('', DETAIL_HEADINGS[action]);
    for (const change of changes) {
      lines.push(`  • ${change.address} (${change.resourceType})`);
      lines.push(`    ${describeAction(action, change.resourceType)}`);
      if (change.replacementFields?.length) {
        lines.push(`    Replacement forced by: ${change.replacementFields.join(', ')}`);
      }
    }
  }
  return lines.join('\n');
}

export function formatNarrative(summary: PlanSummary, opts: NarrativeFormatOptions = {}): string {
  const sections = [
    ['Terraform Plan Summary', '='.repeat(50)].join('\n'),
    describeOverview(summary),
  ];
  if (summary.resourceBreakdown.size > 0) sections.push(describeBreakdown(summary));
  sections.push(describeImpact(summary));
  if (opts.detailed) sections.push(describeChanges(summary));
  return sections.join('\n\n');
}
