/**
 * Structured logging for regeneration runs.
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
export type LogFormat = 'json' | 'text';

const LEVELS: Record<LogLevel, number> = {
  trace: 0,
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

const REDACTED = '***REDACTED***';

export interface WritableOutput {
  write(s: string): void;
}

export interface ContextLoggerOptions {
  name?: string;
  format?: LogFormat;
  level?: LogLevel;
  redactSensitive?: boolean;
  output?: WritableOutput;
  runId?: string | null;
  moduleName?: string | null;
}

export class ContextLogger {
  private _name: string;
  private _format: LogFormat;
  private _level: LogLevel;
  private _levelValue: number;
  private _redactSensitive: boolean;
  private _output: WritableOutput;
  private _runId: string | null;
  private _moduleName: string | null;

  constructor(options?: ContextLoggerOptions) {
    this._name = options?.name ?? 'psmanifest';
    this._format = options?.format ?? 'text';
    this._level = options?.level ?? 'info';
    this._levelValue = LEVELS[this._level];
    this._redactSensitive = options?.redactSensitive ?? true;
    this._output = options?.output ?? { write: (s: string) => console.error(s.replace(/\n$/, '')) };
    this._runId = options?.runId ?? null;
    this._moduleName = options?.moduleName ?? null;
  }

  get runId(): string | null {
    return this._runId;
  }

  get moduleName(): string | null {
    return this._moduleName;
  }

  get level(): LogLevel {
    return this._level;
  }

  /** Logger bound to another run or module, sharing sink and level. */
  child(bindings: { runId?: string | null; moduleName?: string | null }): ContextLogger {
    return new ContextLogger({
      name: this._name,
      format: this._format,
      level: this._level,
      redactSensitive: this._redactSensitive,
      output: this._output,
      runId: bindings.runId !== undefined ? bindings.runId : this._runId,
      moduleName: bindings.moduleName !== undefined ? bindings.moduleName : this._moduleName,
    });
  }

  private _emit(levelName: LogLevel, message: string, extra?: Record<string, unknown> | null): void {
    if (LEVELS[levelName] < this._levelValue) return;

    let redactedExtra: Record<string, unknown> | null = extra ?? null;
    if (extra != null && this._redactSensitive) {
      redactedExtra = {};
      for (const [k, v] of Object.entries(extra)) {
        redactedExtra[k] = k.startsWith('_secret_') ? REDACTED : v;
      }
    }

    const now = new Date();
    if (this._format === 'json') {
      const entry: Record<string, unknown> = {
        timestamp: now.toISOString(),
        level: levelName,
        message,
        run_id: this._runId,
        module: this._moduleName,
        logger: this._name,
        extra: redactedExtra,
      };
      this._output.write(JSON.stringify(entry) + '\n');
      return;
    }

    const ts = now.toISOString().replace('T', ' ').replace(/\.\d+Z$/, '');
    const lvl = levelName.toUpperCase();
    const run = this._runId ?? 'none';
    const mod = this._moduleName ?? 'none';
    let extrasStr = '';
    if (redactedExtra) {
      extrasStr = ' ' + Object.entries(redactedExtra).map(([k, v]) => `${k}=${formatValue(v)}`).join(' ');
    }
    this._output.write(`${ts} [${lvl}] [run=${run}] [module=${mod}] ${message}${extrasStr}\n`);
  }

  trace(message: string, extra?: Record<string, unknown>): void {
    this._emit('trace', message, extra);
  }

  debug(message: string, extra?: Record<string, unknown>): void {
    this._emit('debug', message, extra);
  }

  info(message: string, extra?: Record<string, unknown>): void {
    this._emit('info', message, extra);
  }

  warn(message: string, extra?: Record<string, unknown>): void {
    this._emit('warn', message, extra);
  }

  error(message: string, extra?: Record<string, unknown>): void {
    this._emit('error', message, extra);
  }

  fatal(message: string, extra?: Record<string, unknown>): void {
    this._emit('fatal', message, extra);
  }
}

function formatValue(v: unknown): string {
  if (Array.isArray(v)) return v.join(',');
  if (v !== null && typeof v === 'object') return JSON.stringify(v);
  return String(v);
}

/** Logger that discards everything; the default for library calls. */
export function silentLogger(): ContextLogger {
  return new ContextLogger({ level: 'fatal', output: { write: () => {} } });
}
