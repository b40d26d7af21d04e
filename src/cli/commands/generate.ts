import { execFile } from 'node:child_process';
import { rm, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { promisify } from 'node:util';
import { TerraformCommandError } from '../../errors.js';
import { loadPlanFile } from '../../plan/loader.js';
import { formatText } from '../formatters/text.js';
import { createLogger, type Logger } from '../logger.js';

const execFileAsync = promisify(execFile);

/** Runs a command in `cwd` and resolves with its stdout. */
export type CommandRunner = (command: string, args: string[], cwd: string) => Promise<string>;

export interface GenerateOptions {
  dir?: string;
  planFile?: string;
  autoParse?: boolean;
  detailed?: boolean;
  verbose?: boolean;
  logger?: Logger;
  run?: CommandRunner;
}

const BINARY_PLAN = 'plan.tfplan';

export const runCommand: CommandRunner = async (command, args, cwd) => {
  try {
    // Plan JSON for large stacks easily exceeds the 1MB default buffer
    const { stdout } = await execFileAsync(command, args, { cwd, maxBuffer: 256 * 1024 * 1024 });
    return stdout;
  } catch (err) {
    const stderr = typeof err === 'object' && err !== null && 'stderr' in err && typeof err.stderr === 'string'
      ? err.stderr
      : '';
    throw new TerraformCommandError([command, ...args].join(' '), stderr, { cause: err });
  }
};

export async function generateCommand(opts: GenerateOptions = {}): Promise<void> {
  const log = opts.logger ?? createLogger({ verbose: opts.verbose });
  const run = opts.run ?? runCommand;
  const dir = resolve(opts.dir ?? '.');
  const planPath = resolve(dir, opts.planFile ?? 'plan.json');

  log.info(`Generating Terraform plan in ${dir}...`);
  try {
    await run('terraform', ['plan', `-out=${BINARY_PLAN}`], dir);

    log.info('Converting plan to JSON...');
    const json = await run('terraform', ['show', '-json', BINARY_PLAN], dir);
    await writeFile(planPath, json, 'utf-8');
  } finally {
    await rm(resolve(dir, BINARY_PLAN), { force: true });
  }
  log.info(`Plan saved to ${planPath}`);

  if (opts.autoParse) {
    log.info('\nParsing plan...');
    const summary = await loadPlanFile(planPath);
    log.debug(`analyzed ${summary.totalResources} resource changes`);
    log.info(formatText(summary, { detailed: opts.detailed }));
  }
}
