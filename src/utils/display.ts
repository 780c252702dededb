import chalk from 'chalk';
import * as YAML from 'yaml';
import { completeCommandLineArgs } from '../config/process.js';
import type {
  CompleteDirectoryType,
  CompletePlan,
  CompleteProcessConfig,
  Config,
  DirectoryType,
  Plan,
  ProcessConfig,
  Resources,
  StdioBinding,
} from '../config/types.js';

function handle(binding: StdioBinding | undefined): string | null {
  return binding === undefined ? null : '[HANDLE]';
}

function describeProcessConfig(config: ProcessConfig | undefined) {
  if (config === undefined) return null;
  return {
    environmentVariables: {
      inherit: config.environmentVariables.inherit ?? null,
      specific: config.environmentVariables.specific,
    },
    commandLine: {
      keyBased: config.commandLine.keyBased,
      indexBased: config.commandLine.indexBased,
      completed: completeCommandLineArgs(config.commandLine).join(' '),
    },
    stdIn: handle(config.stdIn),
    stdOut: handle(config.stdOut),
    stdErr: handle(config.stdErr),
  };
}

function describeCompleteProcessConfig(config: CompleteProcessConfig | undefined) {
  if (config === undefined) return null;
  return {
    environmentVariables: config.environmentVariables.map(([name, value]) => `${name}=${value}`),
    commandLine: config.commandLine,
    stdIn: handle(config.stdIn),
    stdOut: handle(config.stdOut),
    stdErr: handle(config.stdErr),
  };
}

function describePlan(plan: Plan) {
  return {
    logger: plan.logger === undefined ? null : '[LOGGER]',
    initDbConfig: describeProcessConfig(plan.initDbConfig),
    createDbConfig: describeProcessConfig(plan.createDbConfig),
    postgresPlan: {
      postgresConfig: describeProcessConfig(plan.postgresPlan.postgresConfig),
      connectionOptions: plan.postgresPlan.connectionOptions,
    },
    postgresConfigFile: plan.postgresConfigFile,
    dataDirectoryString: plan.dataDirectoryString ?? null,
    connectionTimeout: plan.connectionTimeout ?? null,
    initDbCache: plan.initDbCache ?? null,
  };
}

function describeDirectoryType(directory: DirectoryType): string {
  return directory.kind === 'permanent' ? `Permanent ${directory.path}` : 'Temporary';
}

function describeCompleteDirectoryType(directory: CompleteDirectoryType): string {
  return `${directory.kind === 'permanent' ? 'CPermanent' : 'CTemporary'} ${directory.path}`;
}

function describeCompletePlan(plan: CompletePlan) {
  return {
    logger: '[LOGGER]',
    initDbConfig: describeCompleteProcessConfig(plan.initDbConfig),
    createDbConfig: describeCompleteProcessConfig(plan.createDbConfig),
    postgresPlan: {
      postgresConfig: describeCompleteProcessConfig(plan.postgresPlan.postgresConfig),
      connectionOptions: plan.postgresPlan.connectionOptions,
    },
    postgresConfigFile: plan.postgresConfigFile,
    dataDirectory: plan.dataDirectory,
    connectionTimeout: plan.connectionTimeout,
    initDbCache: plan.initDbCache,
  };
}

/** Render a partial plan, including unset fields as `null`. */
export function prettyPrintPlan(plan: Plan): string {
  return formatAsYaml(describePlan(plan));
}

export function prettyPrintConfig(config: Config): string {
  return formatAsYaml({
    plan: describePlan(config.plan),
    socketDirectory: describeDirectoryType(config.socketDirectory),
    dataDirectory: describeDirectoryType(config.dataDirectory),
    port: config.port === undefined ? null : config.port ?? 'free',
    temporaryDirectory: config.temporaryDirectory ?? null,
  });
}

export function describeResources(resources: Resources) {
  return {
    plan: describeCompletePlan(resources.plan),
    socketDirectory: describeCompleteDirectoryType(resources.socketDirectory),
    dataDirectory: describeCompleteDirectoryType(resources.dataDirectory),
    temporaryDirectory: resources.temporaryDirectory,
  };
}

export function prettyPrintResources(resources: Resources): string {
  return formatAsYaml(describeResources(resources));
}

function commandLine(name: string, config: CompleteProcessConfig | undefined): string {
  return config === undefined ? chalk.gray('(skipped)') : `${name} ${config.commandLine.join(' ')}`;
}

export function displayResources(resources: Resources): void {
  const { plan } = resources;
  const options = plan.postgresPlan.connectionOptions;

  console.log();
  console.log(chalk.bold('Resources:'));
  console.log(chalk.gray('─'.repeat(50)));
  console.log(`  Socket Directory: ${chalk.cyan(resources.socketDirectory.path)} ${chalk.gray(`(${resources.socketDirectory.kind})`)}`);
  console.log(`  Data Directory: ${chalk.cyan(resources.dataDirectory.path)} ${chalk.gray(`(${resources.dataDirectory.kind})`)}`);
  console.log(`  Temporary Root: ${resources.temporaryDirectory}`);

  console.log();
  console.log(chalk.bold('Processes:'));
  console.log(`  initdb: ${commandLine('initdb', plan.initDbConfig)}`);
  console.log(`  createdb: ${commandLine('createdb', plan.createDbConfig)}`);
  console.log(`  postgres: ${commandLine('postgres', plan.postgresPlan.postgresConfig)}`);
  console.log(`  Connection Timeout: ${plan.connectionTimeout / 1000000}s`);

  console.log();
  console.log(chalk.bold('postgresql.conf:'));
  for (const line of plan.postgresConfigFile.split('\n').filter(Boolean)) {
    console.log(chalk.gray(`  ${line}`));
  }

  console.log();
  console.log(chalk.bold('psql Command:'));
  const user = options.user === undefined ? '' : ` -U ${options.user}`;
  console.log(chalk.gray(`psql -h ${options.host ?? 'localhost'} -p ${options.port ?? 5432}${user} -d ${options.database ?? 'postgres'}`));

  console.log();
}

export function formatAsJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

export function formatAsYaml(data: unknown): string {
  return YAML.stringify(data, { indent: 2 });
}
