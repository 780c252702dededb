import type { Stream } from 'stream';
import type { Last } from './partial.js';

/** A line-oriented diagnostic sink. */
export type Logger = (line: string) => void;

/**
 * What a process's stdin/stdout/stderr is bound to. These are the values
 * `child_process.spawn` accepts for a single stdio slot.
 */
export type StdioBinding = 'inherit' | 'ignore' | 'pipe' | number | Stream;

/** An ordered environment, as `[name, value]` pairs. */
export type Environment = Array<[string, string]>;

export interface EnvironmentVariables {
  /** Whether the calling process's environment is passed through. */
  inherit: Last<boolean>;
  /** Variables set on top of (or instead of) the inherited ones. */
  specific: Record<string, string>;
}

export interface CommandLineArgs {
  /**
   * Args such as `-h foo`, `--host=foo` and `--switch`. The key is
   * concatenated with the value, so it carries its own separator
   * (`"-h "`, `"--host="`). A `null` value renders the key alone.
   */
  keyBased: Record<string, string | null>;
  /** Positional args placed after the key based ones. */
  indexBased: Record<number, string>;
}

export interface ProcessConfig {
  environmentVariables: EnvironmentVariables;
  commandLine: CommandLineArgs;
  stdIn: Last<StdioBinding>;
  stdOut: Last<StdioBinding>;
  stdErr: Last<StdioBinding>;
}

export interface CompleteProcessConfig {
  environmentVariables: Environment;
  commandLine: string[];
  stdIn: StdioBinding;
  stdOut: StdioBinding;
  stdErr: StdioBinding;
}

export type DirectoryType =
  | { kind: 'temporary' }
  | { kind: 'permanent'; path: string };

export type CompleteDirectoryType =
  | { kind: 'temporary'; path: string }
  | { kind: 'permanent'; path: string };

/**
 * Client connection settings. Field names match `pg`'s `ClientConfig`, so a
 * completed plan's options can be handed straight to a client.
 */
export interface ConnectionOptions {
  host?: string;
  port?: number;
  database?: string;
  user?: string;
  password?: string;
}

export interface PostgresPlan {
  postgresConfig: ProcessConfig;
  connectionOptions: ConnectionOptions;
}

export interface CompletePostgresPlan {
  postgresConfig: CompleteProcessConfig;
  connectionOptions: ConnectionOptions;
}

/** Where a cached `initdb` result lives and whether it is used. */
export interface InitDbCache {
  enabled: boolean;
  directory: string;
}

/** Describes how to run `initdb`, `createdb` and `postgres`. */
export interface Plan {
  logger: Last<Logger>;
  initDbConfig: ProcessConfig | undefined;
  createDbConfig: ProcessConfig | undefined;
  postgresPlan: PostgresPlan;
  /** Lines of `postgresql.conf`. */
  postgresConfigFile: string[];
  dataDirectoryString: Last<string>;
  /** Max time to spend connecting to `postgres`, in microseconds. */
  connectionTimeout: Last<number>;
  /** `null` explicitly disables the cache. */
  initDbCache: Last<InitDbCache | null>;
}

export interface CompletePlan {
  logger: Logger;
  initDbConfig: CompleteProcessConfig | undefined;
  createDbConfig: CompleteProcessConfig | undefined;
  postgresPlan: CompletePostgresPlan;
  postgresConfigFile: string;
  dataDirectory: string;
  connectionTimeout: number;
  initDbCache: InitDbCache | null;
}

/** The high level options for overriding default behavior. */
export interface Config {
  plan: Plan;
  socketDirectory: DirectoryType;
  dataDirectory: DirectoryType;
  /** A fixed port, or `null` to request a free one. */
  port: Last<number | null>;
  /** Parent of the temporary directories. */
  temporaryDirectory: Last<string>;
}

export interface Resources {
  plan: CompletePlan;
  socketDirectory: CompleteDirectoryType;
  dataDirectory: CompleteDirectoryType;
  temporaryDirectory: string;
}
