// Lightweight structured logger for the resolving layer
// Usage:
//   import { createLogger } from './log';
//   const log = createLogger('resolver:address');
//   log.info('resolved', { domain, address });
// Configuration (read from the environment on every emit):
//   NAMING_LOG_LEVEL=debug        # trace|debug|info|warn|error|silent
//   NAMING_LOG_FILTER=chain,rpc   # comma-separated substrings to include (optional)
// Defaults to INFO level and no filter (all categories enabled).

export type LogLevelName = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

type EmitLevel = Exclude<LogLevelName, 'silent'>;

const LEVEL_ORDER: Record<EmitLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
};

function isLevelName(raw: string | undefined): raw is LogLevelName {
  return raw === 'trace' || raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error' || raw === 'silent';
}

function readLevel(): LogLevelName {
  const raw = process.env.NAMING_LOG_LEVEL?.toLowerCase();
  return isLevelName(raw) ? raw : 'info';
}

function readFilter(): string[] | null {
  const raw = process.env.NAMING_LOG_FILTER;
  if (!raw) return null;
  return raw.split(',').map(s => s.trim()).filter(Boolean);
}

function levelEnabled(level: EmitLevel, min: LogLevelName): boolean {
  if (min === 'silent') return false;
  return LEVEL_ORDER[level] >= LEVEL_ORDER[min];
}

function passesFilter(category: string, filter: string[] | null): boolean {
  if (!filter || filter.length === 0) return true;
  const lc = category.toLowerCase();
  return filter.some(f => lc.includes(f.toLowerCase()));
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export interface Logger {
  trace(msg: string, data?: unknown): void;
  debug(msg: string, data?: unknown): void;
  info(msg: string, data?: unknown): void;
  warn(msg: string, data?: unknown): void;
  error(msg: string, data?: unknown): void;
  // Helper to time an async operation
  time<T>(label: string, fn: () => Promise<T>, data?: unknown): Promise<T>;
}

export function createLogger(category: string): Logger {
  let counter = 0;

  function emit(level: EmitLevel, msg: string, data?: unknown): void {
    if (!levelEnabled(level, readLevel())) return;
    if (!passesFilter(category, readFilter())) return;

    const line = `[StarkNaming] [${new Date().toISOString()}] [${level.toUpperCase()}] [${category}] ${msg}`;
    const write = level === 'warn' ? console.warn : level === 'error' ? console.error : console.log;
    if (data !== undefined) {
      write(line, data);
    } else {
      write(line);
    }
  }

  async function time<T>(label: string, fn: () => Promise<T>, data?: unknown): Promise<T> {
    const id = ++counter;
    const start = performance.now();
    emit('debug', `${label} → start #${id}`, data);
    try {
      const result = await fn();
      emit('debug', `${label} ← ok #${id} (${Math.round(performance.now() - start)} ms)`);
      return result;
    } catch (e) {
      emit('error', `${label} ← error #${id} (${Math.round(performance.now() - start)} ms)`, { error: errorMessage(e) });
      throw e;
    }
  }

  return {
    trace: (m, d) => emit('trace', m, d),
    debug: (m, d) => emit('debug', m, d),
    info:  (m, d) => emit('info',  m, d),
    warn:  (m, d) => emit('warn',  m, d),
    error: (m, d) => emit('error', m, d),
    time,
  };
}
