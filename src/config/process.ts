import {
  addErrorContext,
  collectErrors,
  combineIndexed,
  combineLast,
  combineRecord,
  fail,
  getOption,
  succeed,
  validateOptional,
  type Validation,
} from './partial.js';
import type {
  CommandLineArgs,
  CompleteProcessConfig,
  Environment,
  EnvironmentVariables,
  ProcessConfig,
  StdioBinding,
} from './types.js';

export function emptyEnvironmentVariables(): EnvironmentVariables {
  return { inherit: undefined, specific: {} };
}

export function combineEnvironmentVariables(
  left: EnvironmentVariables,
  right: EnvironmentVariables
): EnvironmentVariables {
  return {
    inherit: combineLast(left.inherit, right.inherit),
    specific: combineRecord(left.specific, right.specific),
  };
}

export function emptyCommandLineArgs(): CommandLineArgs {
  return { keyBased: {}, indexBased: {} };
}

export function combineCommandLineArgs(left: CommandLineArgs, right: CommandLineArgs): CommandLineArgs {
  return {
    keyBased: combineRecord(left.keyBased, right.keyBased),
    indexBased: combineIndexed(left.indexBased, right.indexBased),
  };
}

export function emptyProcessConfig(): ProcessConfig {
  return {
    environmentVariables: emptyEnvironmentVariables(),
    commandLine: emptyCommandLineArgs(),
    stdIn: undefined,
    stdOut: undefined,
    stdErr: undefined,
  };
}

export function combineProcessConfig(left: ProcessConfig, right: ProcessConfig): ProcessConfig {
  return {
    environmentVariables: combineEnvironmentVariables(left.environmentVariables, right.environmentVariables),
    commandLine: combineCommandLineArgs(left.commandLine, right.commandLine),
    stdIn: combineLast(left.stdIn, right.stdIn),
    stdOut: combineLast(left.stdOut, right.stdOut),
    stdErr: combineLast(left.stdErr, right.stdErr),
  };
}

/** Inherits the calling process's environment and stdio. */
export function standardProcessConfig(): ProcessConfig {
  return {
    ...emptyProcessConfig(),
    environmentVariables: { inherit: true, specific: {} },
    stdIn: 'inherit',
    stdOut: 'inherit',
    stdErr: 'inherit',
  };
}

/**
 * Inherits the environment and binds every stream to `nullDevice`. Callers
 * that hold an open `/dev/null` descriptor pass it in; the default lets
 * `spawn` discard the streams itself.
 */
export function silentProcessConfig(nullDevice: StdioBinding = 'ignore'): ProcessConfig {
  return {
    ...emptyProcessConfig(),
    environmentVariables: { inherit: true, specific: {} },
    stdIn: nullDevice,
    stdOut: nullDevice,
    stdErr: nullDevice,
  };
}

function byKey<V>(entries: Array<[string, V]>): Array<[string, V]> {
  return entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Inherited variables come first, followed by `specific` in key order. A
 * name present in both is kept twice; which one a spawned process sees is
 * up to the platform.
 */
export function completeEnvironmentVariables(
  env: Environment,
  variables: EnvironmentVariables
): Validation<Environment> {
  if (variables.inherit === undefined) {
    return fail('Missing inherit option');
  }
  const specific = byKey(Object.entries(variables.specific));
  return succeed(variables.inherit ? [...env, ...specific] : specific);
}

/** Values from position 0 for as long as the positions stay contiguous. */
function takeWhileInSequence(indexBased: Record<number, string>): string[] {
  const values: string[] = [];
  for (let position = 0; Object.hasOwn(indexBased, position); position++) {
    values.push(indexBased[position]);
  }
  return values;
}

export function completeCommandLineArgs(args: CommandLineArgs): string[] {
  const keyed = byKey(Object.entries(args.keyBased)).map(([key, value]) =>
    value === null ? key : key + value
  );
  return [...keyed, ...takeWhileInSequence(args.indexBased)];
}

/** Fails with every missing field, not just the first. */
export function completeProcessConfig(
  env: Environment,
  config: ProcessConfig
): Validation<CompleteProcessConfig> {
  const environmentVariables = completeEnvironmentVariables(env, config.environmentVariables);
  const stdIn = getOption('stdIn', config.stdIn);
  const stdOut = getOption('stdOut', config.stdOut);
  const stdErr = getOption('stdErr', config.stdErr);

  if (environmentVariables.ok && stdIn.ok && stdOut.ok && stdErr.ok) {
    return succeed({
      environmentVariables: environmentVariables.value,
      commandLine: completeCommandLineArgs(config.commandLine),
      stdIn: stdIn.value,
      stdOut: stdOut.value,
      stdErr: stdErr.value,
    });
  }
  return collectErrors(environmentVariables, stdIn, stdOut, stdErr);
}

/** {@link completeProcessConfig} for an optional sub-config, with its field name as error context. */
export function completeOptionalProcessConfig(
  name: string,
  env: Environment,
  config: ProcessConfig | undefined
): Validation<CompleteProcessConfig | undefined> {
  return addErrorContext(
    `${name}: `,
    validateOptional(config, present => completeProcessConfig(env, present))
  );
}
