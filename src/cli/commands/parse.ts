import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { ChangeAction, ImpactLevel } from '../../model/change.js';
import type { PlanSummary } from '../../model/summary.js';
import { loadConfig, type OutputFormat } from '../../config/config.js';
import { loadPlanFile } from '../../plan/loader.js';
import { summarizePlan } from '../../plan/aggregator.js';
import { filterSummary, getChangesByAction, getChangesByImpact, getChangesByType } from '../../plan/query.js';
import { formatSummary } from '../formatters/index.js';
import { createLogger, type Logger } from '../logger.js';

export interface ParseOptions {
  cwd?: string;
  format?: OutputFormat;
  detailed?: boolean;
  output?: string;
  color?: boolean;
  verbose?: boolean;
  type?: string;
  action?: ChangeAction;
  impact?: ImpactLevel;
  logger?: Logger;
}

function narrow(summary: PlanSummary, opts: ParseOptions): PlanSummary {
  if (opts.type === undefined && opts.action === undefined && opts.impact === undefined) {
    return summary;
  }
  let current = summary;
  if (opts.type !== undefined) current = summarizePlan(getChangesByType(current, opts.type));
  if (opts.action !== undefined) current = summarizePlan(getChangesByAction(current, opts.action));
  if (opts.impact !== undefined) current = summarizePlan(getChangesByImpact(current, opts.impact));
  return current;
}

export async function parseCommand(planFile: string, opts: ParseOptions = {}): Promise<void> {
  const cwd = opts.cwd ?? process.cwd();
  const log = opts.logger ?? createLogger({ verbose: opts.verbose });

  const config = await loadConfig(cwd);
  if (config.source) log.debug(`using config ${config.source}`);

  const planPath = resolve(cwd, planFile);
  log.debug(`reading plan ${planPath}`);
  const parsed = await loadPlanFile(planPath);
  log.debug(`analyzed ${parsed.totalResources} resource changes`);

  const summary = narrow(filterSummary(parsed, config.filters), opts);
  if (parsed.totalResources > 0 && summary.totalResources === 0) {
    log.warn(`All ${parsed.totalResources} changes were filtered out.`);
  } else if (summary.totalResources !== parsed.totalResources) {
    log.debug(`${summary.totalResources} of ${parsed.totalResources} changes left after filtering`);
  }

  const format = opts.format ?? config.output.format;
  const output = formatSummary(summary, format, {
    detailed: opts.detailed || config.output.detailed,
    color: opts.color === false ? false : config.output.color,
  });

  if (opts.output) {
    const outPath = resolve(cwd, opts.output);
    await writeFile(outPath, output + '\n', 'utf-8');
    log.info(`Output saved to ${opts.output}`);
    return;
  }
  log.info(output);
}
