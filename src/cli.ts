#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { existsSync, writeFileSync } from 'fs';
import { join } from 'path';
import * as packageJson from '../package.json';
import { createAllocator } from './allocator';
import { createConfigLoader, loadDefaultConfig } from './config/loader';
import { renderStarterConfig } from './config/starter';
import { AllocationError } from './orchestration/errors';
import { AllocatorConfig, InstanceStatus, ResourceRecord } from './types';
import { ConsoleLogger, Logger } from './utils/logger';

interface CommonOptions {
  config?: string;
  verbose?: boolean;
  json?: boolean;
}

interface TargetOptions extends CommonOptions {
  template: string;
  ids: string[];
}

interface AllocateOptions extends TargetOptions {
  minCount?: string;
}

interface InitOptions {
  output: string;
  force?: boolean;
}

const program = new Command();

program
  .name('instance-allocator')
  .description('Allocate EC2 and RDS instances keyed by caller-assigned virtual instance IDs')
  .version(packageJson.version);

function targetCommand(name: string, description: string): Command {
  return program
    .command(name)
    .description(description)
    .requiredOption('-t, --template <name>', 'Template name from the configuration file')
    .requiredOption('-i, --ids <ids...>', 'Virtual instance IDs')
    .option('-c, --config <path>', 'Path to configuration file (default: allocator.yml)')
    .option('-v, --verbose', 'Enable verbose logging')
    .option('--json', 'Print machine-readable JSON to stdout');
}

async function loadConfig(options: CommonOptions): Promise<AllocatorConfig> {
  if (!options.config) {
    return loadDefaultConfig();
  }
  return createConfigLoader().load(join(process.cwd(), options.config));
}

function createLogger(options: CommonOptions): Logger {
  return new ConsoleLogger({ verbose: options.verbose, stderr: options.json });
}

/**
 * Aborts in-flight work on Ctrl-C. A second Ctrl-C exits immediately.
 */
function interruptOnSigint(): AbortSignal {
  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.error(chalk.yellow('\nInterrupting, press Ctrl-C again to exit immediately'));
    controller.abort();
    process.once('SIGINT', () => process.exit(130));
  });
  return controller.signal;
}

function toJson(record: ResourceRecord, verbose?: boolean): Record<string, unknown> {
  const { raw, ...rest } = record;
  return verbose ? { ...rest, raw } : rest;
}

function printRecord(record: ResourceRecord): void {
  const color = record.lifecycle === 'ready' ? chalk.green : chalk.yellow;
  console.log(`  ${chalk.bold(record.virtualInstanceId)} ${record.providerResourceId ?? '-'} ${color(record.lifecycle)}`);
  console.log(`    state: ${record.providerState ?? 'unknown'} (${record.status}), address: ${record.address ?? '-'}`);
  for (const [key, value] of Object.entries(record.attributes)) {
    console.log(chalk.gray(`    ${key}: ${value}`));
  }
  if (record.error) {
    console.log(chalk.red(`    ${record.error}`));
  }
}

function printStatus(status: InstanceStatus): string {
  switch (status) {
    case 'running':
      return chalk.green(status);
    case 'failed':
    case 'deleted':
    case 'deleting':
      return chalk.red(status);
    case 'unknown':
      return chalk.gray(status);
    default:
      return chalk.yellow(status);
  }
}

function fail(spinner: ora.Ora, message: string, error: unknown, options: CommonOptions): never {
  spinner.fail(message);
  console.error(chalk.red('❌ Error:'), error instanceof Error ? error.message : error);
  if (options.verbose) {
    console.error(error);
  }
  process.exit(1);
}

targetCommand('allocate', 'Find or launch one instance per virtual instance ID and wait until they are ready')
  .option('-m, --min-count <count>', 'Fewest ready instances for success (default: all)')
  .action(async (options: AllocateOptions) => {
    const spinner = ora('Loading configuration...').start();

    try {
      const config = await loadConfig(options);
      const { template, reconciler } = createAllocator(config, options.template, { logger: createLogger(options) });

      const minCount = options.minCount === undefined ? options.ids.length : Number(options.minCount);
      spinner.text = `Allocating ${options.ids.length} ${template.kind} instance(s) from ${template.name}...`;

      const result = await reconciler.allocate(
        { template, virtualInstanceIds: options.ids, minCount },
        { signal: interruptOnSigint() }
      );

      spinner.succeed(`Allocation ${result.allocationId}: ${result.ready.size} of ${options.ids.length} ready`);

      if (options.json) {
        console.log(JSON.stringify({
          allocationId: result.allocationId,
          records: result.records.map(record => toJson(record, options.verbose)),
          failures: result.failures
        }, null, 2));
        return;
      }

      console.log(chalk.green('\n✅ Ready:'));
      for (const record of result.ready.values()) {
        printRecord(record);
      }
      if (result.failures.length > 0) {
        console.log(chalk.yellow('\n⚠️  Not ready:'));
        for (const failure of result.failures) {
          console.log(`  ${failure.virtualInstanceId} ${failure.lifecycle}: ${failure.reason}`);
        }
      }
    } catch (error) {
      if (error instanceof AllocationError && options.json) {
        console.log(JSON.stringify({ allocationId: error.allocationId, outcomes: error.outcomes }, null, 2));
      }
      fail(spinner, 'Allocation failed', error, options);
    }
  });

targetCommand('find', 'Show the instances currently allocated for virtual instance IDs')
  .action(async (options: TargetOptions) => {
    const spinner = ora('Looking up instances...').start();

    try {
      const config = await loadConfig(options);
      const { template, reconciler } = createAllocator(config, options.template, { logger: createLogger(options) });
      const records = await reconciler.find(template, options.ids, { signal: interruptOnSigint() });

      spinner.succeed(`Found ${records.length} of ${options.ids.length} instance(s)`);

      if (options.json) {
        console.log(JSON.stringify(records.map(record => toJson(record, options.verbose)), null, 2));
        return;
      }
      records.forEach(printRecord);
    } catch (error) {
      fail(spinner, 'Lookup failed', error, options);
    }
  });

targetCommand('status', 'Report the status of each virtual instance ID')
  .action(async (options: TargetOptions) => {
    const spinner = ora('Checking instance status...').start();

    try {
      const config = await loadConfig(options);
      const { template, reconciler } = createAllocator(config, options.template, { logger: createLogger(options) });
      const statuses = await reconciler.getInstanceState(template, options.ids, { signal: interruptOnSigint() });

      spinner.succeed('Status check completed');

      if (options.json) {
        console.log(JSON.stringify(Object.fromEntries(statuses), null, 2));
        return;
      }
      for (const [id, status] of statuses) {
        console.log(`  ${chalk.bold(id)} ${printStatus(status)}`);
      }
    } catch (error) {
      fail(spinner, 'Status check failed', error, options);
    }
  });

targetCommand('delete', 'Terminate the instances allocated for virtual instance IDs')
  .action(async (options: TargetOptions) => {
    const spinner = ora('Deleting instances...').start();

    try {
      const config = await loadConfig(options);
      const { template, reconciler } = createAllocator(config, options.template, { logger: createLogger(options) });
      await reconciler.delete(template, options.ids, { signal: interruptOnSigint() });

      spinner.succeed(`Delete requested for ${options.ids.length} virtual instance ID(s)`);
    } catch (error) {
      fail(spinner, 'Delete failed', error, options);
    }
  });

program
  .command('validate')
  .description('Validate the configuration file')
  .option('-c, --config <path>', 'Path to configuration file (default: allocator.yml)')
  .option('-v, --verbose', 'Enable verbose logging')
  .action(async (options: CommonOptions) => {
    const spinner = ora('Validating configuration...').start();

    try {
      const config = await loadConfig(options);
      spinner.succeed('Configuration is valid');

      const templates = Object.values(config.templates);
      console.log(chalk.blue(`\n📋 Templates (${templates.length}):`));
      for (const template of templates) {
        console.log(`  ${chalk.bold(template.name)} ${template.kind}`);
      }
      console.log(chalk.gray(`\nRegion ${config.aws.region}, tagging ${config.allocation.taggingStrategy}, correlation tag ${config.tags.correlationKey}`));
    } catch (error) {
      fail(spinner, 'Configuration is invalid', error, options);
    }
  });

program
  .command('init')
  .description('Write a starter allocator configuration')
  .option('-o, --output <path>', 'Output configuration file path', 'allocator.yml')
  .option('-f, --force', 'Overwrite an existing file')
  .action((options: InitOptions) => {
    const spinner = ora('Initializing allocator configuration...').start();

    try {
      if (existsSync(options.output) && !options.force) {
        throw new Error(`${options.output} already exists, use --force to overwrite it`);
      }

      const yamlContent = renderStarterConfig(new Date());

      writeFileSync(options.output, yamlContent);

      spinner.succeed(`Configuration file created: ${options.output}`);
      console.log(chalk.green('\n✅ Next steps:'));
      console.log('1. Review and customize the templates');
      console.log('2. Ensure your AWS credentials are configured');
      console.log(`3. Run: ${chalk.cyan('instance-allocator allocate -t worker -i worker-1 worker-2')}`);
    } catch (error) {
      spinner.fail('Initialization failed');
      console.error(chalk.red('❌ Error:'), error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

// Error handling for unknown commands
program.on('command:*', () => {
  console.error(chalk.red('❌ Invalid command. See --help for available commands.'));
  process.exit(1);
});

// Show help if no command provided
if (!process.argv.slice(2).length) {
  program.outputHelp();
} else {
  program.parseAsync().catch((error: unknown) => {
    console.error(chalk.red('❌ Error:'), error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
