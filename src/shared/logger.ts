export interface LogEntry {
  ts: number;
  level: 'info' | 'warn' | 'error';
  source: 'math' | 'copy' | 'scroll' | 'tables' | 'system';
  message: string;
  data?: Record<string, unknown>;
}

const MAX_ENTRIES = 500;

let entries: LogEntry[] = [];
let verbose = false;

function push(entry: LogEntry) {
  entries.push(entry);
  if (entries.length > MAX_ENTRIES) {
    entries = entries.slice(entries.length - MAX_ENTRIES);
  }
}

function consoleOutput(entry: LogEntry) {
  const msg = `[page-enhancer:${entry.source}] ${entry.message}`;
  switch (entry.level) {
    case 'error':
      console.error(msg, entry.data ?? '');
      break;
    case 'warn':
      console.warn(msg, entry.data ?? '');
      break;
    default:
      if (verbose) console.log(msg, entry.data ?? '');
  }
}

/** Echo info entries to the console too (warnings and errors always are) */
export function setVerbose(on: boolean) {
  verbose = on;
}

export function logInfo(source: LogEntry['source'], message: string, data?: Record<string, unknown>) {
  const entry: LogEntry = { ts: Date.now(), level: 'info', source, message, data };
  push(entry);
  consoleOutput(entry);
}

export function logWarn(source: LogEntry['source'], message: string, data?: Record<string, unknown>) {
  const entry: LogEntry = { ts: Date.now(), level: 'warn', source, message, data };
  push(entry);
  consoleOutput(entry);
}

export function logError(source: LogEntry['source'], message: string, data?: Record<string, unknown>) {
  const entry: LogEntry = { ts: Date.now(), level: 'error', source, message, data };
  push(entry);
  consoleOutput(entry);
}

/** Message of anything thrown or rejected */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Get all log entries for the current page view. Only tests read them;
 * nothing on the page consumes the buffer.
 */
export function getEntries(): LogEntry[] {
  return [...entries];
}

export function clearLog() {
  entries = [];
}

/**
 * Reset in-memory state (for testing).
 */
export function _resetForTesting() {
  entries = [];
  verbose = false;
}
