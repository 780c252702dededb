import { readFile } from 'fs/promises';
import * as YAML from 'yaml';
import { combineConfigs, defaultConfig, emptyConfig, emptyPlan, permanent, temporary } from './plan.js';
import { optionsToConfig } from './options.js';
import { emptyProcessConfig } from './process.js';
import type { Config, ConnectionOptions, DirectoryType, ProcessConfig } from './types.js';
import { ConfigFileError, errorMessage } from '../utils/errors.js';
import {
  FieldReader,
  isRecord,
  isValidConnectionTimeout,
  isValidDatabaseName,
  isValidEnvironmentName,
  isValidPort,
  isValidUserName,
  type ValidationError,
} from '../utils/validation.js';

export interface ResolveConfigOptions {
  /** YAML config file layered over the defaults. */
  file?: string;
  /** Environment read for `PGFIXTURE_*` settings; defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
  /** Layers applied last, in order. */
  overrides?: Config[];
}

function directory(path: string | undefined): DirectoryType {
  return path === undefined ? temporary() : permanent(path);
}

function readProcessSection(reader: FieldReader, document: Record<string, unknown>, field: string): ProcessConfig | undefined {
  const section = reader.record(document, field);
  if (section === undefined) return undefined;

  const nested = reader.nested(field);
  const inherit = nested.boolean(section, 'inherit');
  const keyBased = nested.switchMap(section, 'args') ?? {};
  const positional = nested.stringList(section, 'positional') ?? [];
  const specific = nested.stringMap(section, 'env') ?? {};
  for (const name of Object.keys(specific)) {
    nested.check(isValidEnvironmentName(name), `env.${name}`, 'Invalid environment variable name');
  }
  reader.adopt(nested);

  return {
    ...emptyProcessConfig(),
    environmentVariables: { inherit, specific },
    commandLine: { keyBased, indexBased: Object.fromEntries(positional.map((value, index): [number, string] => [index, value])) },
  };
}

function readConnection(reader: FieldReader, document: Record<string, unknown>): ConnectionOptions | undefined {
  const section = reader.record(document, 'connection');
  if (section === undefined) return undefined;

  const nested = reader.nested('connection');
  const options: ConnectionOptions = {
    host: nested.string(section, 'host'),
    port: nested.integer(section, 'port', isValidPort, 'Port must be between 1024 and 65535'),
    database: nested.string(section, 'database'),
    user: nested.string(section, 'user'),
    password: nested.string(section, 'password'),
  };
  if (options.database !== undefined) {
    nested.check(
      isValidDatabaseName(options.database),
      'database',
      'Database name must contain only letters, numbers, and underscores'
    );
  }
  if (options.user !== undefined) {
    nested.check(isValidUserName(options.user), 'user', 'User name must contain only letters, numbers, and underscores');
  }
  reader.adopt(nested);
  return options;
}

function readPort(reader: FieldReader, document: Record<string, unknown>): number | null | undefined {
  if (document.port === 'free' || document.port === null) return null;
  return reader.integer(document, 'port', isValidPort, 'Port must be between 1024 and 65535, null or "free"');
}

/**
 * Convert a parsed config document into a config layer. Every invalid field
 * is reported, not just the first.
 */
export function parseConfigDocument(document: unknown): { config: Config; errors: ValidationError[] } {
  const reader = new FieldReader();
  if (document === undefined || document === null) {
    return { config: emptyConfig(), errors: [] };
  }
  if (!isRecord(document)) {
    return { config: emptyConfig(), errors: [{ field: '(root)', message: 'Config file must be a mapping' }] };
  }

  const connection = readConnection(reader, document);
  const config: Config = {
    plan: {
      ...emptyPlan(),
      initDbConfig: readProcessSection(reader, document, 'initdb'),
      createDbConfig: readProcessSection(reader, document, 'createdb'),
      postgresPlan: {
        postgresConfig: readProcessSection(reader, document, 'postgres') ?? emptyProcessConfig(),
        connectionOptions: {},
      },
      postgresConfigFile: reader.stringList(document, 'postgresConfigFile') ?? [],
      connectionTimeout: reader.integer(
        document,
        'connectionTimeout',
        isValidConnectionTimeout,
        'Connection timeout must be a positive number of microseconds'
      ),
    },
    socketDirectory: directory(reader.string(document, 'socketDirectory')),
    dataDirectory: directory(reader.string(document, 'dataDirectory')),
    port: readPort(reader, document),
    temporaryDirectory: reader.string(document, 'temporaryDirectory'),
  };

  return {
    config: connection === undefined ? config : combineConfigs(optionsToConfig(connection), config),
    errors: reader.errors,
  };
}

/** Reads `PGFIXTURE_PORT`, `PGFIXTURE_TMPDIR`, `PGFIXTURE_DATA_DIR` and `PGFIXTURE_SOCKET_DIR`. */
export function parseEnvironment(env: NodeJS.ProcessEnv): { config: Config; errors: ValidationError[] } {
  const errors: ValidationError[] = [];
  let port: number | null | undefined;
  const rawPort = env.PGFIXTURE_PORT;
  if (rawPort === 'free') {
    port = null;
  } else if (rawPort !== undefined && rawPort !== '') {
    const parsed = Number(rawPort);
    if (isValidPort(parsed)) {
      port = parsed;
    } else {
      errors.push({ field: 'PGFIXTURE_PORT', message: 'Port must be between 1024 and 65535 or "free"' });
    }
  }

  const nonEmpty = (value: string | undefined) => (value === '' ? undefined : value);
  return {
    config: {
      ...emptyConfig(),
      port,
      temporaryDirectory: nonEmpty(env.PGFIXTURE_TMPDIR),
      dataDirectory: directory(nonEmpty(env.PGFIXTURE_DATA_DIR)),
      socketDirectory: directory(nonEmpty(env.PGFIXTURE_SOCKET_DIR)),
    },
    errors,
  };
}

export class ConfigManager {
  async loadConfigFile(path: string): Promise<Config> {
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      throw new ConfigFileError(path, [{ field: '(file)', message: errorMessage(error) }]);
    }

    let document: unknown;
    try {
      document = YAML.parse(content);
    } catch (error) {
      throw new ConfigFileError(path, [{ field: '(yaml)', message: errorMessage(error) }]);
    }

    const { config, errors } = parseConfigDocument(document);
    if (errors.length > 0) {
      throw new ConfigFileError(path, errors);
    }
    return config;
  }

  fromEnvironment(env: NodeJS.ProcessEnv = process.env): Config {
    const { config, errors } = parseEnvironment(env);
    if (errors.length > 0) {
      throw new ConfigFileError('environment', errors);
    }
    return config;
  }

  /** defaults, then the file, then the environment, then `overrides`. */
  async resolve(options: ResolveConfigOptions = {}): Promise<Config> {
    const fileLayer = options.file === undefined ? emptyConfig() : await this.loadConfigFile(options.file);
    const environmentLayer = this.fromEnvironment(options.env);
    return combineConfigs(defaultConfig(), fileLayer, environmentLayer, ...(options.overrides ?? []));
  }
}
