import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { resolve, extname } from 'node:path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigError } from '../errors.js';
import type { ChangeFilters } from '../plan/query.js';

export const OUTPUT_FORMATS = ['text', 'json', 'table', 'terminal', 'natural'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/** Accepted spellings on the command line and in config files */
const FORMAT_ALIASES = new Map<string, OutputFormat>([
  ['text', 'text'],
  ['json', 'json'],
  ['table', 'table'],
  ['terminal', 'terminal'],
  ['rich', 'terminal'],
  ['natural', 'natural'],
  ['narrative', 'natural'],
  ['human', 'natural'],
]);

export const CONFIG_FILES = ['.plandigestrc.json', '.plandigestrc.yml', '.plandigestrc.yaml', '.plandigestrc'];

const ConfigSchema = z.object({
  output: z.object({
    format: z.string().optional(),
    detailed: z.boolean().optional(),
    color: z.boolean().optional(),
  }).strict().optional(),
  filters: z.object({
    includeResourceTypes: z.array(z.string()).optional(),
    excludeResourceTypes: z.array(z.string()).optional(),
    minImpact: z.enum(['low', 'medium', 'high']).optional(),
    includeActions: z.array(z.enum(['create', 'update', 'delete', 'no-op', 'read'])).optional(),
  }).strict().optional(),
}).strict();

export interface OutputConfig {
  format: OutputFormat;
  detailed: boolean;
  color: boolean;
}

export interface PlanDigestConfig {
  output: OutputConfig;
  filters: ChangeFilters;
  /** Absolute path of the file the config came from, if any */
  source?: string;
}

export function defaultConfig(): PlanDigestConfig {
  return {
    output: { format: 'text', detailed: false, color: true },
    filters: {},
  };
}

export function resolveFormat(name: string): OutputFormat | undefined {
  return FORMAT_ALIASES.get(name.toLowerCase());
}

export function findConfigFile(cwd: string): string | undefined {
  for (const name of CONFIG_FILES) {
    const candidate = resolve(cwd, name);
    if (existsSync(candidate)) return candidate;
  }
  return undefined;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function readConfigFile(configPath: string): Promise<string> {
  try {
    return await readFile(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(configPath, `cannot read file (${errorMessage(err)})`, { cause: err });
  }
}

function parseConfigContent(configPath: string, content: string): unknown {
  const ext = extname(configPath);
  try {
    if (ext === '.yml' || ext === '.yaml') {
      return yaml.load(content) ?? {};
    }
    return JSON.parse(content);
  } catch (err) {
    throw new ConfigError(configPath, errorMessage(err), { cause: err });
  }
}

export async function loadConfig(cwd: string): Promise<PlanDigestConfig> {
  const configPath = findConfigFile(cwd);
  const config = defaultConfig();
  if (!configPath) return config;

  const content = await readConfigFile(configPath);
  const result = ConfigSchema.safeParse(parseConfigContent(configPath, content));
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'config';
    throw new ConfigError(configPath, `${where}: ${issue?.message ?? 'unexpected structure'}`);
  }

  const { output = {}, filters = {} } = result.data;
  let format = config.output.format;
  if (output.format !== undefined) {
    const resolved = resolveFormat(output.format);
    if (!resolved) {
      throw new ConfigError(configPath, `output.format: unknown format "${output.format}"`);
    }
    format = resolved;
  }

  return {
    output: {
      format,
      detailed: output.detailed ?? config.output.detailed,
      color: output.color ?? config.output.color,
    },
    filters,
    source: configPath,
  };
}
