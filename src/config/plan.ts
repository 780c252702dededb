import {
  addErrorContext,
  collectErrors,
  combineLast,
  combineOptional,
  getOption,
  mapValidation,
  succeed,
  type Validation,
} from './partial.js';
import {
  combineProcessConfig,
  completeOptionalProcessConfig,
  completeProcessConfig,
  emptyProcessConfig,
  standardProcessConfig,
} from './process.js';
import type {
  CompletePlan,
  CompletePostgresPlan,
  Config,
  ConnectionOptions,
  DirectoryType,
  Environment,
  Plan,
  PostgresPlan,
  ProcessConfig,
} from './types.js';
import { defaultPlanLogger } from '../utils/logger.js';

/** One minute, in microseconds. */
export const DEFAULT_CONNECTION_TIMEOUT = 60 * 1000000;

export function combineConnectionOptions(left: ConnectionOptions, right: ConnectionOptions): ConnectionOptions {
  return {
    host: combineLast(left.host, right.host),
    port: combineLast(left.port, right.port),
    database: combineLast(left.database, right.database),
    user: combineLast(left.user, right.user),
    password: combineLast(left.password, right.password),
  };
}

export function emptyPostgresPlan(): PostgresPlan {
  return { postgresConfig: emptyProcessConfig(), connectionOptions: {} };
}

export function combinePostgresPlan(left: PostgresPlan, right: PostgresPlan): PostgresPlan {
  return {
    postgresConfig: combineProcessConfig(left.postgresConfig, right.postgresConfig),
    connectionOptions: combineConnectionOptions(left.connectionOptions, right.connectionOptions),
  };
}

export function emptyPlan(): Plan {
  return {
    logger: undefined,
    initDbConfig: undefined,
    createDbConfig: undefined,
    postgresPlan: emptyPostgresPlan(),
    postgresConfigFile: [],
    dataDirectoryString: undefined,
    connectionTimeout: undefined,
    initDbCache: undefined,
  };
}

/** Field-wise merge; the right plan's explicit values win. Config-file lines append. */
export function combinePlan(left: Plan, right: Plan): Plan {
  return {
    logger: combineLast(left.logger, right.logger),
    initDbConfig: combineOptional(left.initDbConfig, right.initDbConfig, combineProcessConfig),
    createDbConfig: combineOptional(left.createDbConfig, right.createDbConfig, combineProcessConfig),
    postgresPlan: combinePostgresPlan(left.postgresPlan, right.postgresPlan),
    postgresConfigFile: [...left.postgresConfigFile, ...right.postgresConfigFile],
    dataDirectoryString: combineLast(left.dataDirectoryString, right.dataDirectoryString),
    connectionTimeout: combineLast(left.connectionTimeout, right.connectionTimeout),
    initDbCache: combineLast(left.initDbCache, right.initDbCache),
  };
}

/** `generated` is the base layer, `override` wins wherever both are set. */
export function mergePlans(generated: Plan, override: Plan): Plan {
  return combinePlan(generated, override);
}

export function temporary(): DirectoryType {
  return { kind: 'temporary' };
}

export function permanent(path: string): DirectoryType {
  return { kind: 'permanent', path };
}

/** Permanent beats temporary on either side; of two permanents the right one wins. */
export function combineDirectoryType(left: DirectoryType, right: DirectoryType): DirectoryType {
  return right.kind === 'temporary' ? left : right;
}

export function emptyConfig(): Config {
  return {
    plan: emptyPlan(),
    socketDirectory: temporary(),
    dataDirectory: temporary(),
    port: undefined,
    temporaryDirectory: undefined,
  };
}

export function combineConfig(left: Config, right: Config): Config {
  return {
    plan: combinePlan(left.plan, right.plan),
    socketDirectory: combineDirectoryType(left.socketDirectory, right.socketDirectory),
    dataDirectory: combineDirectoryType(left.dataDirectory, right.dataDirectory),
    port: combineLast(left.port, right.port),
    temporaryDirectory: combineLast(left.temporaryDirectory, right.temporaryDirectory),
  };
}

/** Fold any number of config layers left to right. */
export function combineConfigs(...layers: Config[]): Config {
  return layers.reduce(combineConfig, emptyConfig());
}

/** Runs `initdb` with the standard settings, on a free port in temporary directories. */
export function defaultConfig(): Config {
  return {
    ...emptyConfig(),
    plan: { ...emptyPlan(), initDbConfig: standardProcessConfig() },
    port: null,
  };
}

export function hasInitDb(plan: Plan): boolean {
  return plan.initDbConfig !== undefined;
}

export function hasCreateDb(plan: Plan): boolean {
  return plan.createDbConfig !== undefined;
}

/** Binds `postgres` to loopback only and puts its socket in `directory`. */
export function socketDirectoryToConfig(directory: string): string[] {
  return [
    "listen_addresses = '127.0.0.1, ::1'",
    `unix_socket_directories = '${directory}'`,
  ];
}

function withArgs(base: ProcessConfig, keyBased: Record<string, string | null>): ProcessConfig {
  return { ...base, commandLine: { ...base.commandLine, keyBased } };
}

export interface GeneratePlanOptions {
  makeInitDb: boolean;
  makeCreateDb: boolean;
  port: number;
  socketDirectory: string;
  dataDirectory: string;
}

/**
 * The generated base plan: command lines for every process pointing at the
 * given port and directories. The caller's plan is merged on top of it.
 */
export function generatePlan({
  makeInitDb,
  makeCreateDb,
  port,
  socketDirectory,
  dataDirectory,
}: GeneratePlanOptions): Plan {
  return {
    ...emptyPlan(),
    postgresConfigFile: socketDirectoryToConfig(socketDirectory),
    dataDirectoryString: dataDirectory,
    connectionTimeout: DEFAULT_CONNECTION_TIMEOUT,
    logger: defaultPlanLogger,
    initDbCache: null,
    postgresPlan: {
      postgresConfig: withArgs(standardProcessConfig(), {
        '-p ': String(port),
        '-D ': dataDirectory,
      }),
      connectionOptions: {
        host: socketDirectory,
        port,
        database: 'postgres',
      },
    },
    createDbConfig: makeCreateDb
      ? withArgs(standardProcessConfig(), {
          '-h ': socketDirectory,
          '-p ': String(port),
        })
      : undefined,
    initDbConfig: makeInitDb
      ? withArgs(standardProcessConfig(), { '--pgdata=': dataDirectory })
      : undefined,
  };
}

export function completePostgresPlan(env: Environment, plan: PostgresPlan): Validation<CompletePostgresPlan> {
  return mapValidation(
    addErrorContext('postgresConfig: ', completeProcessConfig(env, plan.postgresConfig)),
    postgresConfig => ({ postgresConfig, connectionOptions: plan.connectionOptions })
  );
}

/** Fails with every missing option of the plan and its sub-configs. */
export function completePlan(env: Environment, plan: Plan): Validation<CompletePlan> {
  const logger = getOption('logger', plan.logger);
  const initDbConfig = completeOptionalProcessConfig('initDbConfig', env, plan.initDbConfig);
  const createDbConfig = completeOptionalProcessConfig('createDbConfig', env, plan.createDbConfig);
  const postgresPlan = addErrorContext('postgresPlan: ', completePostgresPlan(env, plan.postgresPlan));
  const dataDirectory = getOption('dataDirectoryString', plan.dataDirectoryString);
  const connectionTimeout = getOption('connectionTimeout', plan.connectionTimeout);
  const initDbCache = getOption('initDbCache', plan.initDbCache);

  if (
    logger.ok &&
    initDbConfig.ok &&
    createDbConfig.ok &&
    postgresPlan.ok &&
    dataDirectory.ok &&
    connectionTimeout.ok &&
    initDbCache.ok
  ) {
    return succeed({
      logger: logger.value,
      initDbConfig: initDbConfig.value,
      createDbConfig: createDbConfig.value,
      postgresPlan: postgresPlan.value,
      postgresConfigFile: plan.postgresConfigFile.map(line => `${line}\n`).join(''),
      dataDirectory: dataDirectory.value,
      connectionTimeout: connectionTimeout.value,
      initDbCache: initDbCache.value,
    });
  }

  return collectErrors(
    logger,
    initDbConfig,
    createDbConfig,
    postgresPlan,
    dataDirectory,
    connectionTimeout,
    initDbCache
  );
}
