export type DebugLogger = {
  enabled(): boolean;
  log(...args: unknown[]): void;
};

function debugEnabled(): boolean {
  const g = globalThis as unknown as { __MDREFLOW_DEBUG__?: boolean };
  if (g.__MDREFLOW_DEBUG__ === true) return true;
  return typeof process !== 'undefined' && process.env?.MDREFLOW_DEBUG === '1';
}

/**
 * Debug channel toggled by `MDREFLOW_DEBUG=1` or `globalThis.__MDREFLOW_DEBUG__`.
 * The flag is read on every call so tests can flip it at run time.
 */
export function createDebugLogger(scope: string): DebugLogger {
  return {
    enabled: debugEnabled,
    log(...args: unknown[]): void {
      if (!debugEnabled()) return;
      console.log(`[mdreflow:${scope}]`, ...args);
    }
  };
}
