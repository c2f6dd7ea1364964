#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import { checkCommand } from './commands/check.js';
import { initCommand } from './commands/init.js';
import { explainCommand } from './commands/explain.js';
import { getCliVersion } from './utils/cli-version.js';

const program = new Command();

program
    .name('portcheck')
    .description('Migration coverage gate: is every public function and class of the reference code present in the rewrite?')
    .version(getCliVersion())
    .addHelpText('before', chalk.bold.cyan('portcheck - migration coverage gate\n'));

program
    .command('init')
    .description('Create a starter portcheck.yml in the current directory')
    .option('-r, --reference <path>', 'Root of the reference (source) corpus')
    .option('--dry-run', 'Print the configuration without writing it')
    .option('-f, --force', 'Overwrite an existing portcheck.yml')
    .addHelpText('after', `
Examples:
  $ portcheck init                       # Detect the rewrite layout and write portcheck.yml
  $ portcheck init -r legacy/pkg --force # Point at the reference tree, overwrite
    `)
    .action(async (options: { reference?: string; dryRun?: boolean; force?: boolean }) => {
        await initCommand(process.cwd(), options);
    });

program
    .command('check')
    .description('Extract reference symbols, search the candidate corpus and report coverage')
    .option('-c, --config <path>', 'Path to a custom portcheck.yml')
    .option('-t, --threshold <percent>', 'Pass threshold percentage (overrides config)')
    .option('-p, --policy <policy>', 'Exit policy: advisory (always succeed) or gating (fail below threshold)')
    .option('--json', 'Print the result as JSON')
    .option('--ci', 'Print a minimal result for CI logs')
    .option('-v, --verbose', 'Log skipped files and other debug detail')
    .addHelpText('after', `
Examples:
  $ portcheck check                      # Advisory run with portcheck.yml
  $ portcheck check --policy gating      # Fail the job below the threshold
  $ portcheck check -t 75 --ci           # Lower bar, terse output
    `)
    .action(async (options: { config?: string; threshold?: string; policy?: string; json?: boolean; ci?: boolean; verbose?: boolean }) => {
        await checkCommand(process.cwd(), options);
    });

program
    .command('explain')
    .description('Summarize the last report and list missing items by module')
    .option('-c, --config <path>', 'Path to a custom portcheck.yml')
    .action(async (options: { config?: string }) => {
        await explainCommand(process.cwd(), options);
    });

await program.parseAsync();
