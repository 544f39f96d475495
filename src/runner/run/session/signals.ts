// src/runner/run/session/signals.ts
import { debugLog } from '@/runner/util/debug';
import { DBG_SCOPE_SESSION } from '@/runner/util/debug-scopes';

/** Install a SIGINT handler for the duration of a session; returns the detach function. */
export const attachSessionSignals = (onSigint: () => void): (() => void) => {
  debugLog(DBG_SCOPE_SESSION, 'install SIGINT handler');
  process.on('SIGINT', onSigint);
  return () => {
    debugLog(DBG_SCOPE_SESSION, 'detach SIGINT handler');
    process.off('SIGINT', onSigint);
  };
};
