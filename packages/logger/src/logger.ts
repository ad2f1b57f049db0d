import pino from 'pino'

/**
 * Log levels:
 * - fatal (60): Unrecoverable failure, the process exits non-zero
 * - error (50): A request or write failed
 * - warn (40): Retries, dropped records
 * - info (30): Run progress (default)
 * - debug (20): Per-request detail
 * - trace (10): Very detailed trace messages
 */
type LevelName = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace'

type LogFn = (msgOrObj: unknown, ...args: unknown[]) => void

type Logger = Record<LevelName, LogFn> & {
  child: (bindings: Record<string, unknown>) => Logger
}

type RootLoggerOptions = {
  level?: string
  /** Extra newline-delimited JSON destination, written next to the pretty console output */
  file?: string
}

const LEVELS: readonly LevelName[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace']

const prettyOptions = {
  colorize: true,
  translateTime: 'SYS:HH:MM:ss',
  ignore: 'pid,hostname',
  messageFormat: '{msg}',
  customColors: 'fatal:bgRed,error:red,warn:yellow,info:cyan,debug:green,trace:gray',
  customLevels: 'fatal:60,error:50,warn:40,info:30,debug:20,trace:10'
}

function isLevel(value: string | undefined): value is pino.LevelWithSilent {
  return value === 'silent' || LEVELS.some(name => name === value)
}

function resolveLevel(level: string | undefined): pino.LevelWithSilent {
  const candidate = level?.trim().toLowerCase()
  return isLevel(candidate) ? candidate : 'info'
}

function formatArgs(msgOrObj: unknown, args: unknown[]): string {
  if (args.length === 0) {
    return msgOrObj instanceof Error ? msgOrObj.message : String(msgOrObj)
  }

  if (args.length === 1) {
    const [data] = args
    if (data instanceof Error) {
      return `${String(msgOrObj)} ${data.message}`
    }
    if (typeof data === 'object' && data !== null) {
      return `${String(msgOrObj)} ${JSON.stringify(data)}`
    }
    return `${String(msgOrObj)} ${String(data)}`
  }

  return [msgOrObj, ...args]
    .map(arg => (typeof arg === 'object' && arg !== null ? JSON.stringify(arg) : String(arg)))
    .join(' ')
}

/**
 * Wrapper to make logger more flexible with arguments
 */
const createLoggerWrapper = (logger: pino.Logger): Logger => {
  const wrap =
    (level: LevelName): LogFn =>
    (msgOrObj, ...args) => {
      logger[level](formatArgs(msgOrObj, args))
    }

  return {
    fatal: wrap('fatal'),
    error: wrap('error'),
    warn: wrap('warn'),
    info: wrap('info'),
    debug: wrap('debug'),
    trace: wrap('trace'),
    child: bindings => createLoggerWrapper(logger.child(bindings))
  }
}

/**
 * Create the process logger. The CLI calls this once and hands the result
 * (or children of it) to every component it builds.
 *
 * @example
 * ```typescript
 * const log = createRootLogger({ level: process.env.LOG_LEVEL, file: process.env.LOG_FILE });
 * log.info('Starting fetch...');
 * log.debug('Request detail:', { cursor: 1700000000000 });
 * ```
 *
 * Set log level via environment variable:
 * ```bash
 * LOG_LEVEL=debug npm run sleep:fetch
 * LOG_FILE=./sleep_cloud.log npm run sleep:fetch
 * ```
 */
export function createRootLogger(options: RootLoggerOptions = {}): Logger {
  const level = resolveLevel(options.level)

  if (!options.file) {
    return createLoggerWrapper(
      pino({ level, transport: { target: 'pino-pretty', options: prettyOptions } })
    )
  }

  return createLoggerWrapper(
    pino({
      level,
      transport: {
        targets: [
          { target: 'pino-pretty', level, options: prettyOptions },
          { target: 'pino/file', level, options: { destination: options.file, mkdir: true } }
        ]
      }
    })
  )
}

/**
 * Create a child logger with a specific context
 *
 * @example
 * ```typescript
 * const clientLog = createLogger(log, 'SleepCloudClient');
 * clientLog.info('Fetching page...');
 * ```
 */
export function createLogger(parent: Logger, context: string): Logger {
  return parent.child({ context })
}

export type { Logger, LogFn, LevelName, RootLoggerOptions }
