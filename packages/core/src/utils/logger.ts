export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';

type LogRecord = {
  ts: string;
  level: LogLevel;
  msg: string;
  [key: string]: unknown;
};

export type LoggerOptions = {
  level?: LogLevel;
  format?: LogFormat;
  /** Line sink (default: stderr) */
  write?: (line: string) => void;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const SECRET_KEY_PATTERN =
  /^(password|token|accessToken|clientSecret|client_secret|secret|private_key|privateKey|credentials|authorization)$/i;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

function redactString(value: string): string {
  // Bearer tokens
  let out = value.replace(/\bBearer\s+([A-Za-z0-9._-]{8,})\b/g, 'Bearer [REDACTED]');

  // PEM private keys embedded in messages
  out = out.replace(
    /-----BEGIN [A-Z ]*PRIVATE KEY-----[\s\S]*?-----END [A-Z ]*PRIVATE KEY-----/g,
    '[REDACTED PRIVATE KEY]'
  );

  return out;
}

export function redactSecrets(value: unknown): unknown {
  if (value === null || value === undefined) return value;
  if (typeof value === 'string') return redactString(value);
  if (typeof value === 'number' || typeof value === 'boolean') return value;
  if (Array.isArray(value)) return value.map(redactSecrets);
  if (value instanceof Error) {
    const code = 'code' in value && typeof value.code === 'string' ? value.code : undefined;
    return {
      name: value.name,
      message: redactString(value.message),
      ...(code ? { code } : {}),
    };
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = SECRET_KEY_PATTERN.test(k) ? '[REDACTED]' : redactSecrets(v);
    }
    return out;
  }
  return String(value);
}

function formatTextValue(value: unknown): string {
  if (typeof value === 'string') {
    return /[\s"=]/.test(value) ? JSON.stringify(value) : value;
  }
  if (isPlainObject(value) && typeof value.message === 'string') {
    return JSON.stringify(value.message);
  }
  return JSON.stringify(value) ?? String(value);
}

export class Logger {
  private readonly fields: Record<string, unknown>;

  constructor(
    private readonly options: LoggerOptions = {},
    fields: Record<string, unknown> = {}
  ) {
    this.fields = fields;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.options.level ?? 'info'];
  }

  /**
   * Logger that adds `fields` to every record
   */
  child(fields: Record<string, unknown>): Logger {
    return new Logger(this.options, { ...this.fields, ...fields });
  }

  log(level: LogLevel, msg: string, extra?: Record<string, unknown>): void {
    if (!this.isLevelEnabled(level)) return;

    const record: LogRecord = {
      ts: new Date().toISOString(),
      level,
      msg,
      ...this.fields,
      ...(extra ?? {}),
    };

    const sanitized = redactSecrets(record);
    if (!isPlainObject(sanitized)) return;

    const write = this.options.write ?? ((line: string) => process.stderr.write(line));

    if ((this.options.format ?? 'text') === 'json') {
      write(`${JSON.stringify(sanitized)}\n`);
      return;
    }

    const { ts, level: _level, msg: message, ...rest } = sanitized;
    const pairs = Object.entries(rest)
      .filter(([, v]) => v !== undefined)
      .map(([k, v]) => `${k}=${formatTextValue(v)}`);
    const suffix = pairs.length ? ` ${pairs.join(' ')}` : '';
    write(`[${String(ts)}] ${level.toUpperCase()} ${String(message)}${suffix}\n`);
  }

  debug(msg: string, extra?: Record<string, unknown>) {
    this.log('debug', msg, extra);
  }
  info(msg: string, extra?: Record<string, unknown>) {
    this.log('info', msg, extra);
  }
  warn(msg: string, extra?: Record<string, unknown>) {
    this.log('warn', msg, extra);
  }
  error(msg: string, extra?: Record<string, unknown>) {
    this.log('error', msg, extra);
  }
}

/** Logger that drops everything */
export const silentLogger = new Logger({ write: () => undefined });
