/* src/runner/run/exec/supervisor.ts
 * Tracks the child currently running so cancellation can terminate its process tree.
 */
import treeKill from 'tree-kill';

import { DBG_SCOPE_EXEC } from '@/runner/util/debug-scopes';
import { debugLog } from '@/runner/util/debug';

export class ProcessSupervisor {
  private readonly pids = new Map<string, number>();
  private cancelledFlag = false;

  get cancelled(): boolean {
    return this.cancelledFlag;
  }

  track(key: string, pid: number): void {
    this.pids.set(key, pid);
  }

  untrack(key: string): void {
    this.pids.delete(key);
  }

  /** Mark the session cancelled and SIGTERM every tracked process tree. */
  cancel(): void {
    this.cancelledFlag = true;
    for (const [key, pid] of this.pids) {
      debugLog(DBG_SCOPE_EXEC, `kill ${key} (pid ${pid.toString()})`);
      treeKill(pid, 'SIGTERM', (err) => {
        if (err) debugLog(DBG_SCOPE_EXEC, `kill ${key} failed: ${err.message}`);
      });
    }
    this.pids.clear();
  }
}
