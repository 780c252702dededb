import { mkdtemp, rename, rm } from 'fs/promises';
import { homedir } from 'os';
import { join } from 'path';
import type { CompleteDirectoryType, DirectoryType } from '../config/types.js';
import { CleanupError, ResourceAcquisitionError, isMissingPathError } from '../utils/errors.js';

const DEFERRED_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

let criticalDepth = 0;
const pendingSignals = new Set<NodeJS.Signals>();
const deferSignal = (signal: NodeJS.Signals) => {
  pendingSignals.add(signal);
};

function enterCriticalSection(): void {
  if (criticalDepth++ === 0) {
    for (const signal of DEFERRED_SIGNALS) process.on(signal, deferSignal);
  }
}

function leaveCriticalSection(): void {
  if (--criticalDepth > 0) return;
  for (const signal of DEFERRED_SIGNALS) process.off(signal, deferSignal);

  const signals = [...pendingSignals];
  pendingSignals.clear();
  for (const signal of signals) {
    // Someone else handled it when it arrived; only re-deliver what would have
    // hit the default handler.
    if (process.listenerCount(signal) === 0) process.kill(process.pid, signal);
  }
}

/**
 * Run `task` with SIGINT, SIGTERM and SIGHUP held back. Signals that arrive
 * meanwhile are re-delivered once every running section has finished.
 */
export async function runUninterruptibly<T>(task: () => Promise<T>): Promise<T> {
  enterCriticalSection();
  try {
    return await task();
  } finally {
    leaveCriticalSection();
  }
}

/**
 * Remove a directory tree, treating a missing directory as already removed.
 *
 * The directory is renamed to `<path>_removing` first so nothing new lands
 * under the original name while the tree is deleted. Once started, the
 * rename and delete are not cut short by a signal.
 */
export async function removeDirectoryIgnoringMissing(path: string): Promise<void> {
  const removing = `${path}_removing`;
  try {
    await runUninterruptibly(async () => {
      await rename(path, removing);
      await rm(removing, { recursive: true, force: true });
    });
  } catch (error) {
    if (isMissingPathError(error)) return;
    throw new CleanupError(path, error);
  }
}

function expandHome(path: string): string {
  return path.startsWith('~') ? join(homedir(), path.slice(1)) : path;
}

/**
 * Create a fresh temporary directory under `temporaryDirectory`, named
 * `<pattern>-XXXXXX`, or resolve a permanent one. Permanent directories are
 * neither created nor checked.
 */
export async function setupDirectoryType(
  temporaryDirectory: string,
  pattern: string,
  directory: DirectoryType
): Promise<CompleteDirectoryType> {
  if (directory.kind === 'permanent') {
    return { kind: 'permanent', path: expandHome(directory.path) };
  }
  try {
    const path = await mkdtemp(join(temporaryDirectory, `${pattern}-`));
    return { kind: 'temporary', path };
  } catch (error) {
    throw new ResourceAcquisitionError(`temporary directory '${pattern}' in '${temporaryDirectory}'`, error);
  }
}

/** Delete a temporary directory; leave a permanent one alone. Safe to call twice. */
export async function cleanupDirectoryType(directory: CompleteDirectoryType): Promise<void> {
  if (directory.kind === 'temporary') {
    await removeDirectoryIgnoringMissing(directory.path);
  }
}

export function toFilePath(directory: CompleteDirectoryType): string {
  return directory.path;
}

/** Mark a directory so cleanup leaves it on disk. */
export function makePermanent(directory: CompleteDirectoryType): CompleteDirectoryType {
  return { kind: 'permanent', path: directory.path };
}
