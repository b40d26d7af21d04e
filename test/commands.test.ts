import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { copyFile, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import { parseCommand } from '../src/cli/commands/parse.js';
import { generateCommand, type CommandRunner } from '../src/cli/commands/generate.js';
import { loadPlanFile } from '../src/plan/loader.js';
import { formatText } from '../src/cli/formatters/text.js';
import { formatJson } from '../src/cli/formatters/json.js';
import type { Logger } from '../src/cli/logger.js';
import { PlanFileNotFoundError, TerraformCommandError } from '../src/errors.js';

const fixtures = resolve(__dirname, 'fixtures');

function fakeLogger() {
  return {
    debug: vi.fn<(message: string) => void>(),
    info: vi.fn<(message: string) => void>(),
    warn: vi.fn<(message: string) => void>(),
    error: vi.fn<(message: string) => void>(),
  } satisfies Logger;
}

describe('parseCommand', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'plandigest-parse-'));
    await copyFile(resolve(fixtures, 'sample-plan.json'), join(dir, 'plan.json'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('prints the text summary by default', async () => {
    const logger = fakeLogger();
    await parseCommand('plan.json', { cwd: dir, logger });

    const summary = await loadPlanFile(join(dir, 'plan.json'));
    expect(logger.info).toHaveBeenCalledWith(formatText(summary));
  });

  it('writes output to a file', async () => {
    const logger = fakeLogger();
    await parseCommand('plan.json', { cwd: dir, logger, format: 'json', output: 'summary.json' });

    const written = await readFile(join(dir, 'summary.json'), 'utf-8');
    const summary = await loadPlanFile(join(dir, 'plan.json'));
    expect(written).toBe(formatJson(summary) + '\n');
    expect(logger.info).toHaveBeenCalledWith('Output saved to summary.json');
  });

  it('narrows the summary with query options', async () => {
    const logger = fakeLogger();
    await parseCommand('plan.json', { cwd: dir, logger, format: 'json', type: 'aws_instance', impact: 'high' });

    const printed: unknown = JSON.parse(logger.info.mock.calls[0][0]);
    expect(printed).toMatchObject({
      overview: { total_resources: 1, resources_to_delete: 1 },
      changes: [{ address: 'aws_instance.old' }],
    });
  });

  it('applies filters and output defaults from the config file', async () => {
    await writeFile(join(dir, '.plandigestrc.json'), JSON.stringify({
      output: { format: 'json' },
      filters: { includeActions: ['create'] },
    }));
    const logger = fakeLogger();
    await parseCommand('plan.json', { cwd: dir, logger });

    const printed: unknown = JSON.parse(logger.info.mock.calls[0][0]);
    expect(printed).toMatchObject({ overview: { total_resources: 1, resources_to_create: 1 } });
    expect(logger.debug).toHaveBeenCalledWith(`using config ${join(dir, '.plandigestrc.json')}`);
  });

  it('warns when the filters leave no changes', async () => {
    const logger = fakeLogger();
    await parseCommand('plan.json', { cwd: dir, logger, type: 'google_compute_instance' });

    expect(logger.warn).toHaveBeenCalledWith('All 3 changes were filtered out.');
  });

  it('propagates a missing plan file', async () => {
    await expect(parseCommand('missing.json', { cwd: dir, logger: fakeLogger() }))
      .rejects.toBeInstanceOf(PlanFileNotFoundError);
  });
});

describe('generateCommand', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'plandigest-generate-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('runs terraform, saves the JSON plan and removes the binary plan', async () => {
    const planJson = await readFile(resolve(fixtures, 'sample-plan.json'), 'utf-8');
    const calls: string[] = [];
    const run: CommandRunner = async (command, args, cwd) => {
      calls.push(`${command} ${args.join(' ')} @ ${cwd}`);
      if (args[0] === 'plan') {
        await writeFile(join(cwd, 'plan.tfplan'), 'binary');
        return '';
      }
      return planJson;
    };
    const logger = fakeLogger();

    await generateCommand({ dir, run, logger, autoParse: true });

    expect(calls).toEqual([
      `terraform plan -out=plan.tfplan @ ${dir}`,
      `terraform show -json plan.tfplan @ ${dir}`,
    ]);
    expect(await readFile(join(dir, 'plan.json'), 'utf-8')).toBe(planJson);
    expect(existsSync(join(dir, 'plan.tfplan'))).toBe(false);
    expect(logger.info).toHaveBeenCalledWith(`Plan saved to ${join(dir, 'plan.json')}`);

    const summary = await loadPlanFile(join(dir, 'plan.json'));
    expect(logger.info).toHaveBeenLastCalledWith(formatText(summary));
  });

  it('propagates a failing terraform command and cleans up', async () => {
    const run: CommandRunner = async (command, args, cwd) => {
      await writeFile(join(cwd, 'plan.tfplan'), 'partial');
      throw new TerraformCommandError(`${command} ${args.join(' ')}`, 'Error: No configuration files');
    };

    await expect(generateCommand({ dir, run, logger: fakeLogger() })).rejects.toThrow(
      '`terraform plan -out=plan.tfplan` failed: Error: No configuration files',
    );
    expect(existsSync(join(dir, 'plan.tfplan'))).toBe(false);
    expect(existsSync(join(dir, 'plan.json'))).toBe(false);
  });
});
