import { readFile } from 'node:fs/promises';
import type { PlanSummary } from '../model/summary.js';
import { InvalidPlanError, PlanFileNotFoundError } from '../errors.js';
import { RawPlanSchema, type RawPlan } from './schema.js';
import { analyzePlan } from './aggregator.js';

export function decodePlan(json: string): RawPlan {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (err) {
    throw new InvalidPlanError(`not valid JSON (${errorMessage(err)})`, { cause: err });
  }

  const result = RawPlanSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'document';
    throw new InvalidPlanError(`${where}: ${issue?.message ?? 'unexpected structure'}`, { cause: result.error });
  }
  return result.data;
}

export function parsePlanJson(json: string): PlanSummary {
  return analyzePlan(decodePlan(json));
}

export async function loadPlanFile(filePath: string): Promise<PlanSummary> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    if (isNodeError(err) && err.code === 'ENOENT') {
      throw new PlanFileNotFoundError(filePath);
    }
    throw err;
  }
  return parsePlanJson(content);
}

function isNodeError(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
