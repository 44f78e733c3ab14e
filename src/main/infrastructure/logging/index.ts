import pino from 'pino'
import pretty from 'pino-pretty'
import { isDevelopment, isTestEnvironment } from '@shared/utils/environment'
import { TOOL_NAME } from '@config/constants'

export interface LoggingOptions {
  verbose?: boolean
  logFile?: string
}

type LogLevel = 'info' | 'warn' | 'error' | 'debug'

function consoleLevel(verbose: boolean): pino.LevelWithSilent {
  if (isTestEnvironment()) return 'silent'
  return verbose || isDevelopment() ? 'debug' : 'warn'
}

// Logs go to stderr so that a JSON export on stdout stays clean
function createPinoLogger(options: LoggingOptions = {}): pino.Logger {
  const level = consoleLevel(options.verbose ?? false)

  const streams: pino.StreamEntry[] = [
    {
      level: level === 'silent' ? 'fatal' : level,
      stream: pretty({
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname,tool',
        destination: 2,
        sync: true
      })
    }
  ]

  if (options.logFile) {
    streams.push({
      level: 'debug',
      stream: pino.destination({ dest: options.logFile, sync: true, mkdir: true })
    })
  }

  return pino(
    {
      level: options.logFile ? 'debug' : level,
      formatters: {
        level: (label) => {
          return { level: label }
        }
      },
      base: {
        pid: process.pid,
        tool: TOOL_NAME
      }
    },
    pino.multistream(streams)
  )
}

let pinoLogger = createPinoLogger()

// Supports both: logger.info(msg, obj) and logger.info(obj, msg)
function createLogMethod(level: LogLevel) {
  return (msgOrObj: string | object, objOrMsg?: unknown) => {
    if (typeof msgOrObj === 'string') {
      if (objOrMsg !== undefined) {
        if (typeof objOrMsg === 'object' && objOrMsg !== null) {
          pinoLogger[level](objOrMsg, msgOrObj)
        } else {
          pinoLogger[level]({ data: objOrMsg }, msgOrObj)
        }
      } else {
        pinoLogger[level](msgOrObj)
      }
    } else {
      if (typeof objOrMsg === 'string') {
        pinoLogger[level](msgOrObj, objOrMsg)
      } else {
        pinoLogger[level](msgOrObj)
      }
    }
  }
}

export const logger = {
  info: createLogMethod('info'),
  warn: createLogMethod('warn'),
  error: createLogMethod('error'),
  debug: createLogMethod('debug')
}

/**
 * Rebuilds the underlying pino instance. Must run before collection starts so
 * that `--verbose` and `--log-file` apply to every module.
 */
export function configureLogging(options: LoggingOptions): void {
  pinoLogger = createPinoLogger(options)
  if (options.logFile) {
    logger.debug('Logging to file', { logFile: options.logFile })
  }
}
