// src/core/trace.ts
// Injectable trace logging

export type TraceLog = (msg: string, data?: unknown) => void;

export const noTrace: TraceLog = () => undefined;

/**
 * Build a trace log writing `[ordstream]`-prefixed lines to `sink`, or a
 * no-op when tracing is disabled.
 */
export function createTraceLog(enabled: boolean, sink: TraceLog = console.log): TraceLog {
  if (!enabled) return noTrace;
  return (msg, data) => {
    if (data === undefined) {
      sink(`[ordstream] ${msg}`);
    } else {
      sink(`[ordstream] ${msg}`, data);
    }
  };
}
