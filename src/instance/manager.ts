import { tmpdir } from 'os';
import { completePlan, generatePlan, hasCreateDb, hasInitDb, mergePlans } from '../config/plan.js';
import type { Config, Environment, Resources } from '../config/types.js';
import { CompletePlanError, ResourceAcquisitionError, errorMessage } from '../utils/errors.js';
import { createLogger, type ComponentLogger } from '../utils/logger.js';
import { prettyPrintPlan } from '../utils/display.js';
import { cleanupDirectoryType, makePermanent, setupDirectoryType } from './directory.js';
import { getFreePort, type FreePortProvider } from './port.js';
import { RollbackStack } from './rollback.js';

export const SOCKET_DIRECTORY_PATTERN = 'pgfixture-socket';
export const DATA_DIRECTORY_PATTERN = 'pgfixture-data';

export type SetupState =
  | 'start'
  | 'port-resolved'
  | 'socket-directory-acquired'
  | 'data-directory-acquired'
  | 'plan-completed'
  | 'rolled-back';

export interface ResourceManagerOptions {
  freePort?: FreePortProvider;
  /** Snapshot of the environment the processes may inherit. */
  environment?: () => Environment;
  logger?: ComponentLogger;
  /** Creates or resolves a directory; swapped out to simulate filesystem failures. */
  createDirectory?: typeof setupDirectoryType;
}

export function snapshotEnvironment(source: NodeJS.ProcessEnv = process.env): Environment {
  const env: Environment = [];
  for (const [name, value] of Object.entries(source)) {
    if (value !== undefined) env.push([name, value]);
  }
  return env;
}

/**
 * `/tmp` keeps UNIX socket paths well under the platform length limit, which
 * `os.tmpdir()` does not on macOS.
 */
export function defaultTemporaryDirectory(): string {
  return process.platform === 'win32' ? tmpdir() : '/tmp';
}

export class ResourceManager {
  private freePort: FreePortProvider;
  private environment: () => Environment;
  private log: ComponentLogger;
  private createDirectory: typeof setupDirectoryType;

  constructor(options: ResourceManagerOptions = {}) {
    this.freePort = options.freePort ?? getFreePort;
    this.environment = options.environment ?? (() => snapshotEnvironment());
    this.log = options.logger ?? createLogger('resources');
    this.createDirectory = options.createDirectory ?? setupDirectoryType;
  }

  /**
   * Acquire the port and directories `config` needs and complete its plan.
   * If anything fails, every directory created so far is removed before the
   * error propagates.
   */
  async setup(config: Config): Promise<Resources> {
    this.transition('start');
    const env = this.environment();
    const port = await this.resolvePort(config.port);
    this.transition('port-resolved', `port ${port}`);

    const temporaryDirectory = config.temporaryDirectory ?? defaultTemporaryDirectory();
    const rollback = new RollbackStack();

    try {
      const socketDirectory = await rollback.acquire(
        () => this.createDirectory(temporaryDirectory, SOCKET_DIRECTORY_PATTERN, config.socketDirectory),
        cleanupDirectoryType
      );
      this.transition('socket-directory-acquired', socketDirectory.path);

      const dataDirectory = await rollback.acquire(
        () => this.createDirectory(temporaryDirectory, DATA_DIRECTORY_PATTERN, config.dataDirectory),
        cleanupDirectoryType
      );
      this.transition('data-directory-acquired', dataDirectory.path);

      const generated = generatePlan({
        makeInitDb: hasInitDb(config.plan),
        makeCreateDb: hasCreateDb(config.plan),
        port,
        socketDirectory: socketDirectory.path,
        dataDirectory: dataDirectory.path,
      });
      const merged = mergePlans(generated, config.plan);
      const completed = completePlan(env, merged);
      if (!completed.ok) {
        throw new CompletePlanError(prettyPrintPlan(merged), completed.errors);
      }

      rollback.commit();
      this.transition('plan-completed');
      return { plan: completed.value, socketDirectory, dataDirectory, temporaryDirectory };
    } catch (error) {
      const cleanupErrors = await rollback.unwind();
      for (const cleanupError of cleanupErrors) {
        this.log.warn(`Rollback incomplete: ${errorMessage(cleanupError)}`);
      }
      this.transition('rolled-back', errorMessage(error));
      throw error;
    }
  }

  /**
   * Remove the temporary directories of `resources`. Both are attempted; a
   * directory that is already gone counts as removed.
   */
  async release(resources: Resources): Promise<void> {
    const failures: unknown[] = [];
    for (const directory of [resources.socketDirectory, resources.dataDirectory]) {
      try {
        await cleanupDirectoryType(directory);
      } catch (error) {
        failures.push(error);
      }
    }
    if (failures.length > 0) {
      throw failures[0];
    }
  }

  private async resolvePort(port: Config['port']): Promise<number> {
    if (typeof port === 'number') return port;
    try {
      return await this.freePort();
    } catch (error) {
      throw new ResourceAcquisitionError('a free port', error);
    }
  }

  private transition(state: SetupState, detail?: string): void {
    this.log.debug(detail === undefined ? state : `${state}: ${detail}`);
  }
}

/** Keep the data directory on disk when the resources are released. */
export function makeResourcesDataDirPermanent(resources: Resources): Resources {
  return { ...resources, dataDirectory: makePermanent(resources.dataDirectory) };
}

export function setupConfig(config: Config, options?: ResourceManagerOptions): Promise<Resources> {
  return new ResourceManager(options).setup(config);
}

export function cleanupConfig(resources: Resources): Promise<void> {
  return new ResourceManager().release(resources);
}
