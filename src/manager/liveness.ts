import type { StatusStore } from '../monitoring/status-store.js';
import type { ProcessTable } from './process-table.js';

/**
 * A worker is running when its pid file exists and the recorded pid is alive.
 * A pid file without a live process (a crashed worker) reads as not running;
 * the stale file is left where it is.
 */
export async function isWorkerRunning(
  workerId: string,
  store: StatusStore,
  processTable: ProcessTable
): Promise<boolean> {
  const pid = await store.readLivenessMarker(workerId);
  if (pid === null) {
    return false;
  }
  return processTable.exists(pid);
}
