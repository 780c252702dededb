import { combineConfig, combinePlan, defaultConfig, emptyConfig, emptyPlan, permanent, temporary } from './plan.js';
import { combineProcessConfig, emptyProcessConfig } from './process.js';
import type { Config, ConnectionOptions, DirectoryType, Plan, ProcessConfig } from './types.js';

/** Databases every fresh cluster already has; no `createdb` step is needed for them. */
const EXISTING_DATABASES = new Set(['postgres', 'template1']);

function processConfigWith(overrides: {
  keyBased?: Record<string, string | null>;
  indexBased?: Record<number, string>;
  specific?: Record<string, string>;
}): ProcessConfig {
  const base = emptyProcessConfig();
  return {
    ...base,
    environmentVariables: { ...base.environmentVariables, specific: overrides.specific ?? {} },
    commandLine: {
      keyBased: overrides.keyBased ?? {},
      indexBased: overrides.indexBased ?? {},
    },
  };
}

function dbnameToCreateDb(database: string, user?: string, password?: string): ProcessConfig | undefined {
  if (EXISTING_DATABASES.has(database)) return undefined;
  return processConfigWith({
    indexBased: { 0: database },
    keyBased: user === undefined ? {} : { '--username=': user },
    specific: password === undefined ? {} : { PGPASSWORD: password },
  });
}

function userAndPasswordToInitDb(user?: string, password?: string): ProcessConfig | undefined {
  if (user === undefined && password === undefined) return undefined;
  return combineProcessConfig(
    processConfigWith({ keyBased: user === undefined ? {} : { '--username=': user } }),
    processConfigWith({ specific: password === undefined ? {} : { PGPASSWORD: password } })
  );
}

/**
 * A plan layer that produces a cluster the given options can connect to:
 * `initdb` creates the user, `createdb` creates the database, and the options
 * become the postgres plan's connection options.
 */
export function optionsToPlan(options: ConnectionOptions): Plan {
  const { database, user, password } = options;
  return combinePlan(
    {
      ...emptyPlan(),
      initDbConfig: userAndPasswordToInitDb(user, password),
      createDbConfig: database === undefined ? undefined : dbnameToCreateDb(database, user, password),
    },
    {
      ...emptyPlan(),
      postgresPlan: { postgresConfig: emptyProcessConfig(), connectionOptions: options },
    }
  );
}

/** A host starting with `/` is a UNIX socket directory that must be used as is. */
export function hostToSocketDirectory(host: string): DirectoryType {
  return host.startsWith('/') ? permanent(host) : temporary();
}

export function optionsToConfig(options: ConnectionOptions): Config {
  return {
    ...emptyConfig(),
    plan: optionsToPlan(options),
    port: options.port,
    socketDirectory: options.host === undefined ? temporary() : hostToSocketDirectory(options.host),
  };
}

/** {@link defaultConfig} with {@link optionsToConfig} on top. */
export function optionsToDefaultConfig(options: ConnectionOptions): Config {
  return combineConfig(defaultConfig(), optionsToConfig(options));
}
