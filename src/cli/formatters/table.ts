import type { PlanSummary } from '../../model/summary.js';

type Cell = string | number;

/**
 * Renders a grid table:
 *
 *   +--------+-------+
 *   | Metric | Count |
 *   +========+=======+
 *   | Total  |     3 |
 *   +--------+-------+
 *
 * Numeric columns are right-aligned, everything else left-aligned.
 */
export function renderGrid(headers: readonly string[], rows: readonly (readonly Cell[])[]): string {
  const numeric = headers.map((_, i) => rows.length > 0 && rows.every(r => typeof r[i] === 'number'));
  const widths = headers.map((h, i) =>
    Math.max(h.length, ...rows.map(r => String(r[i] ?? '').length)),
  );

  const rule = (fill: string) => '+' + widths.map(w => fill.repeat(w + 2)).join('+') + '+';
  const line = (cells: readonly Cell[]) =>
    '|' + widths.map((w, i) => {
      const text = String(cells[i] ?? '');
      return ' ' + (numeric[i] ? text.padStart(w) : text.padEnd(w)) + ' ';
    }).join('|') + '|';

  const out = [rule('-'), line(headers), rule('=')];
  for (const row of rows) {
    out.push(line(row), rule('-'));
  }
  return out.join('\n');
}

export function formatTable(summary: PlanSummary): string {
  const overview = renderGrid(['Metric', 'Count'], [
    ['Total Resources', summary.totalResources],
    ['To Create', summary.resourcesToCreate],
    ['To Update', summary.resourcesToUpdate],
    ['To Delete', summary.resourcesToDelete],
    ['No Changes', summary.resourcesNoChange],
  ]);

  const breakdown = summary.resourceBreakdown.size > 0
    ? renderGrid(
        ['Resource Type', 'Total', 'Create', 'Update', 'Delete', 'No-op'],
        [...summary.resourceBreakdown].map(([type, c]) => [type, c.total, c.create, c.update, c.delete, c['no-op']]),
      )
    : 'No resource changes found.';

  const impact = renderGrid(['Impact Level', 'Count'], [
    ['High Impact', summary.impactAnalysis.high],
    ['Medium Impact', summary.impactAnalysis.medium],
    ['Low Impact', summary.impactAnalysis.low],
  ]);

  return [
    'Terraform Plan Summary',
    '======================',
    '',
    'Overview:',
    overview,
    '',
    'Resource Breakdown:',
    breakdown,
    '',
    'Impact Analysis:',
    impact,
  ].join('\n');
}
