import chalk, { Chalk, type ChalkInstance } from 'chalk';
import { IMPACT_LEVELS, type ImpactLevel } from '../../model/change.js';
import type { CountedAction, PlanSummary } from '../../model/summary.js';
import { LISTED_ACTIONS, groupByAction, plural } from './shared.js';

export interface TerminalFormatOptions {
  detailed?: boolean;
  color?: boolean;
}

const WIDTH = 55;

const SYMBOLS: Readonly<Record<CountedAction, string>> = {
  create: '⊕',
  update: '∆',
  delete: '⊖',
  'no-op': '·',
};

const LABELS: Readonly<Record<CountedAction, string>> = {
  create: 'create',
  update: 'update',
  delete: 'destroy',
  'no-op': 'no-op',
};

function palette(c: ChalkInstance) {
  const actions: Record<CountedAction, ChalkInstance> = {
    create: c.green,
    update: c.yellow,
    delete: c.red,
    'no-op': c.dim,
  };
  const impacts: Record<ImpactLevel, ChalkInstance> = {
    high: c.red,
    medium: c.yellow,
    low: c.green,
  };
  return { actions, impacts };
}

function box(c: ChalkInstance, title: string, body: string[]): string[] {
  const header = `─ ${title} `;
  return [
    c.dim(`┌${header}${'─'.repeat(Math.max(0, WIDTH - header.length))}`),
    c.dim('│'),
    ...body.map(line => c.dim('│  ') + line),
    c.dim('│'),
    c.dim('└' + '─'.repeat(WIDTH)),
  ];
}

export function formatTerminal(summary: PlanSummary, opts: TerminalFormatOptions = {}): string {
  const c = new Chalk({ level: opts.color === false ? 0 : chalk.level });
  const { actions, impacts } = palette(c);

  if (summary.totalResources === 0) {
    return c.dim('No changes. Infrastructure matches the configuration.');
  }

  const counts: Record<CountedAction, number> = {
    create: summary.resourcesToCreate,
    update: summary.resourcesToUpdate,
    delete: summary.resourcesToDelete,
    'no-op': summary.resourcesNoChange,
  };

  const overview = [`${'total'.padEnd(9)} ${c.bold(String(summary.totalResources))}`];
  for (const action of LISTED_ACTIONS) {
    const label = `${SYMBOLS[action]} ${LABELS[action]}`.padEnd(9);
    overview.push(`${actions[action](label)} ${counts[action]}`);
  }

  const breakdown: string[] = [];
  for (const [type, typeCounts] of summary.resourceBreakdown) {
    const parts: string[] = [];
    if (typeCounts.create > 0) parts.push(c.green(`+${typeCounts.create}`));
    if (typeCounts.update > 0) parts.push(c.yellow(`~${typeCounts.update}`));
    if (typeCounts.delete > 0) parts.push(c.red(`-${typeCounts.delete}`));
    if (typeCounts['no-op'] > 0) parts.push(c.dim(`=${typeCounts['no-op']}`));
    breakdown.push(`${c.bold(type)}  ${parts.join(' ')}`.trimEnd());
    breakdown.push(c.dim(`  ${plural(typeCounts.total, 'resource')}`));
  }

  const impact = IMPACT_LEVELS.map(level =>
    `${impacts[level](`● ${level}`.padEnd(9))} ${summary.impactAnalysis[level]}`,
  );

  const lines = [
    ...box(c, 'Terraform Plan Summary', overview),
    '',
    ...box(c, 'Resource Breakdown', breakdown),
    '',
    ...box(c, 'Impact Analysis', impact),
  ];

  if (opts.detailed) {
    for (const [action, changes] of groupByAction(summary.changes)) {
      if (changes.length === 0) continue;
      const title = `${action.toUpperCase()} (${plural(changes.length, 'resource')})`;
      const body = changes.map(ch => {
        const tag = impacts[ch.impactLevel](`[${ch.impactLevel}]`);
        return `${actions[action](SYMBOLS[action])} ${ch.address} ${c.dim(ch.resourceType)} ${tag}`;
      });
      lines.push('', ...box(c, title, body));
    }
  }

  lines.push(
    '',
    `Plan: ${c.green(`${summary.resourcesToCreate} to add`)}, ` +
      `${c.yellow(`${summary.resourcesToUpdate} to change`)}, ` +
      `${c.red(`${summary.resourcesToDelete} to destroy`)}.`,
  );

  return lines.join('\n');
}
