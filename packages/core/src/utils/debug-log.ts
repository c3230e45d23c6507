import { CONFIG } from './config.js';

function isVerbose(): boolean {
  try {
    return CONFIG.debug.verbose;
  } catch {
    return false;
  }
}

/** Writes `[scope] message` to stderr when VERBOSE is set. */
export function debugLog(scope: string, msg: string, data?: unknown): void {
  if (isVerbose()) {
    console.error(`[${scope}] ${msg}`, data !== undefined ? JSON.stringify(data) : '');
  }
}
