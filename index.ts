#!/usr/bin/env node

import { readFileSync } from 'fs';
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { ConfigManager } from './src/config/manager.js';
import { optionsToConfig } from './src/config/options.js';
import { permanent } from './src/config/plan.js';
import type { Config, ConnectionOptions } from './src/config/types.js';
import { ResourceManager, makeResourcesDataDirPermanent } from './src/instance/manager.js';
import { describeResources, displayResources, formatAsJson, formatAsYaml, prettyPrintConfig } from './src/utils/display.js';
import { errorMessage } from './src/utils/errors.js';
import { isRecord, isValidPort } from './src/utils/validation.js';

interface LayerOptions {
  file?: string;
  port?: number;
  tempDir?: string;
  dataDir?: string;
  socketDir?: string;
  initdb: boolean;
  createdb?: string;
  user?: string;
  password?: string;
}

interface PlanOptions extends LayerOptions {
  format: string;
  keep?: boolean;
  keepData?: boolean;
}

function readVersion(): string {
  // Resolved from dist/index.js
  const manifest: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
  return isRecord(manifest) && typeof manifest.version === 'string' ? manifest.version : '0.0.0';
}

const program = new Command();
const configManager = new ConfigManager();
const resourceManager = new ResourceManager();

function parsePort(value: string): number {
  const port = Number(value);
  if (!isValidPort(port)) {
    throw new InvalidArgumentError('Port must be between 1024 and 65535.');
  }
  return port;
}

function withLayerOptions(command: Command): Command {
  return command
    .option('-f, --file <file>', 'YAML config file layered over the defaults')
    .option('-p, --port <port>', 'use this port instead of a free one', parsePort)
    .option('--temp-dir <dir>', 'parent directory of the temporary directories')
    .option('--data-dir <dir>', 'use an existing data directory (never deleted)')
    .option('--socket-dir <dir>', 'use an existing socket directory (never deleted)')
    .option('--no-initdb', 'skip initdb')
    .option('--createdb <name>', 'create a database with createdb')
    .option('-U, --user <user>', 'database user to create')
    .option('--password <password>', 'password for the database user');
}

/** The command line flags as the last config layer. */
function commandLineLayer(options: LayerOptions): Config {
  const connection: ConnectionOptions = {
    database: options.createdb,
    user: options.user,
    password: options.password,
  };
  const layer: Config = {
    ...optionsToConfig(connection),
    port: options.port,
    temporaryDirectory: options.tempDir,
  };
  if (options.dataDir !== undefined) layer.dataDirectory = permanent(options.dataDir);
  if (options.socketDir !== undefined) layer.socketDirectory = permanent(options.socketDir);
  return layer;
}

async function resolveConfig(options: LayerOptions): Promise<Config> {
  const config = await configManager.resolve({
    file: options.file,
    overrides: [commandLineLayer(options)],
  });
  if (options.initdb) return config;
  return { ...config, plan: { ...config.plan, initDbConfig: undefined } };
}

program
  .name('pgfixture')
  .description('Disposable PostgreSQL fixtures for tests')
  .version(readVersion(), '-v, --version', 'display version number');

// Plan command
withLayerOptions(
  program
    .command('plan')
    .description('acquire temporary resources and print the completed plan')
    .option('--format <format>', 'output format (text, yaml, json)', 'text')
    .option('--keep', 'keep both directories instead of removing them')
    .option('--keep-data', 'remove the socket directory but keep the data directory')
).action(async (options: PlanOptions) => {
  const spinner = ora('Acquiring resources...').start();

  try {
    const config = await resolveConfig(options);
    const resources = await resourceManager.setup(config);
    spinner.stop();

    if (options.format === 'json') {
      console.log(formatAsJson(describeResources(resources)));
    } else if (options.format === 'yaml') {
      console.log(formatAsYaml(describeResources(resources)));
    } else {
      displayResources(resources);
    }

    if (options.keep) {
      console.error(chalk.gray(`Kept ${resources.socketDirectory.path} and ${resources.dataDirectory.path}`));
      return;
    }

    if (options.keepData) {
      await resourceManager.release(makeResourcesDataDirPermanent(resources));
      console.error(chalk.gray(`Kept ${resources.dataDirectory.path}`));
      return;
    }

    await resourceManager.release(resources);
  } catch (error) {
    spinner.fail(`Failed to create plan: ${errorMessage(error)}`);
    process.exit(1);
  }
});

// Config command
withLayerOptions(
  program
    .command('config')
    .description('print the merged configuration without acquiring anything')
).action(async (options: LayerOptions) => {
  try {
    const config = await resolveConfig(options);
    console.log(prettyPrintConfig(config));
  } catch (error) {
    console.log(chalk.red(`Failed to resolve config: ${errorMessage(error)}`));
    process.exit(1);
  }
});

// Error handling
program.configureOutput({
  writeErr: (str) => process.stderr.write(chalk.red(str))
});

await program.parseAsync();
