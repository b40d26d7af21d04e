#!/usr/bin/env node

import { Command, InvalidArgumentError, Option } from 'commander';
import { parseCommand } from '../src/cli/commands/parse.js';
import { generateCommand } from '../src/cli/commands/generate.js';
import { resolveFormat, type OutputFormat } from '../src/config/config.js';
import { isChangeAction, isImpactLevel, type ChangeAction, type ImpactLevel } from '../src/model/change.js';
import { runAction } from '../src/cli/run.js';

function parseFormat(value: string): OutputFormat {
  const format = resolveFormat(value);
  if (!format) {
    throw new InvalidArgumentError('Expected text, json, table, terminal (rich), or natural (narrative, human).');
  }
  return format;
}

function parseAction(value: string): ChangeAction {
  if (!isChangeAction(value)) {
    throw new InvalidArgumentError('Expected create, update, delete, no-op, or read.');
  }
  return value;
}

function parseImpact(value: string): ImpactLevel {
  if (!isImpactLevel(value)) {
    throw new InvalidArgumentError('Expected low, medium, or high.');
  }
  return value;
}

const program = new Command();

program
  .name('plandigest')
  .description('Summarize Terraform plan JSON — counts, per-type breakdown and impact')
  .version('0.1.0');

program
  .command('parse <plan-file>')
  .description('Summarize a plan produced by `terraform show -json`')
  .option('-d, --detailed', 'Show every resource change')
  .addOption(new Option('-f, --format <format>', 'Output format: text, json, table, terminal, natural').argParser(parseFormat))
  .option('-o, --output <file>', 'Save output to a file')
  .option('--no-color', 'Disable colored output')
  .option('--verbose', 'Print debug information to stderr')
  .option('--type <resource-type>', 'Only include changes to this resource type')
  .addOption(new Option('--action <action>', 'Only include changes with this action').argParser(parseAction))
  .addOption(new Option('--impact <level>', 'Only include changes with this impact level').argParser(parseImpact))
  .action(async (planFile: string, opts) => {
    await runAction(() => parseCommand(planFile, {
      format: opts.format,
      detailed: opts.detailed,
      output: opts.output,
      color: opts.color,
      verbose: opts.verbose,
      type: opts.type,
      action: opts.action,
      impact: opts.impact,
    }));
  });

program
  .command('generate')
  .description('Run terraform plan, save it as JSON, and optionally summarize it')
  .option('-d, --dir <dir>', 'Terraform working directory', '.')
  .option('-p, --plan-file <file>', 'JSON plan file to write, relative to --dir', 'plan.json')
  .option('--auto-parse', 'Summarize the plan after generating it')
  .option('--detailed', 'Show every resource change when summarizing')
  .option('--verbose', 'Print debug information to stderr')
  .action(async (opts) => {
    await runAction(() => generateCommand({
      dir: opts.dir,
      planFile: opts.planFile,
      autoParse: opts.autoParse,
      detailed: opts.detailed,
      verbose: opts.verbose,
    }));
  });

await program.parseAsync();
