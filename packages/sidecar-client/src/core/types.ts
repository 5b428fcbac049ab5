// Pure types for functional core

/**
 * Side effects interface for dependency injection
 */
export interface SidecarEffects {
  fetch: typeof fetch;
  log: (level: 'debug' | 'info' | 'warn' | 'error', message: string, metadata?: Record<string, unknown>) => void;
  now: () => number;
}
