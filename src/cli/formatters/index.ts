import type { OutputFormat } from '../../config/config.js';
import type { PlanSummary } from '../../model/summary.js';
import { formatJson } from './json.js';
import { formatNarrative } from './narrative.js';
import { formatTable } from './table.js';
import { formatTerminal } from './terminal.js';
import { formatText } from './text.js';

export interface FormatOptions {
  detailed?: boolean;
  color?: boolean;
}

export function formatSummary(summary: PlanSummary, format: OutputFormat, opts: FormatOptions = {}): string {
  switch (format) {
    case 'json': return formatJson(summary);
    case 'table': return formatTable(summary);
    case 'terminal': return formatTerminal(summary, opts);
    case 'natural': return formatNarrative(summary, opts);
    case 'text': return formatText(summary, opts);
  }
}

export { formatJson, formatNarrative, formatTable, formatTerminal, formatText };
