import fs from 'node:fs'
import path from 'node:path'
import { parseArgs } from 'node:util'
import { configureLogging, logger, type LoggingOptions } from '@infra/logging'
import { ExitCode, TOOL_NAME, TOOL_VERSION, type RequiredCommand } from '@config/constants'
import { sanitizeForLog } from '@shared/utils/validators'
import { exportToJson } from '@main/presentation/json-export'
import { renderTable } from '@main/presentation/table-renderer'
import { createSystemDataSources, type NetworkDataSources } from './data-sources'
import { checkDependencies, collectNetworkData } from './orchestrator'

export const EXPORT_FORMATS = ['json'] as const

export type ExportFormat = (typeof EXPORT_FORMATS)[number]

export interface CliOptions {
  verbose: boolean
  help: boolean
  logFile?: string
  exportFormat?: ExportFormat
  output?: string
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'CliUsageError'
  }
}

export const USAGE = `Usage: ${TOOL_NAME} [-v|--verbose] [--log-file PATH] [--export json] [--output PATH]

Network interface analysis tool for GNU/Linux (${TOOL_NAME} ${TOOL_VERSION})

Options:
  -v, --verbose       Enable debug logging
  --log-file PATH     Write logs to file
  --export FORMAT     Export format (json)
  --output PATH       Export destination file (requires --export)
  -h, --help          Show this help

Examples:
  ${TOOL_NAME}                                   Display table
  ${TOOL_NAME} -v                                Verbose output
  ${TOOL_NAME} --export json                     Export to JSON (stdout)
  ${TOOL_NAME} --export json --output report.json
  ${TOOL_NAME} -v --log-file debug.log

Exit codes:
  0 - Success
  1 - General error
  2 - Missing dependencies
  4 - Invalid arguments`

function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some((format) => format === value)
}

function parseRaw(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    strict: true,
    allowPositionals: false,
    options: {
      verbose: { type: 'boolean', short: 'v' },
      help: { type: 'boolean', short: 'h' },
      'log-file': { type: 'string' },
      export: { type: 'string' },
      output: { type: 'string' }
    }
  })
}

export function parseCliArgs(argv: readonly string[]): CliOptions {
  let values: ReturnType<typeof parseRaw>['values']
  try {
    values = parseRaw(argv).values
  } catch (error) {
    throw new CliUsageError(error instanceof Error ? error.message : String(error))
  }

  const exportFormat = values.export
  if (exportFormat !== undefined && !isExportFormat(exportFormat)) {
    throw new CliUsageError(`Unsupported export format: ${exportFormat}`)
  }

  if (values.output !== undefined && exportFormat === undefined) {
    throw new CliUsageError('--output requires --export')
  }

  return {
    verbose: values.verbose ?? false,
    help: values.help ?? false,
    logFile: values['log-file'],
    exportFormat,
    output: values.output
  }
}

// temp file + rename
async function writeFileAtomic(filePath: string, contents: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true })
  const tmpPath = `${filePath}.tmp.${Date.now()}.${Math.random().toString(36).substring(7)}`
  await fs.promises.writeFile(tmpPath, contents, 'utf8')
  await fs.promises.rename(tmpPath, filePath)
}

async function appendFile(filePath: string, contents: string): Promise<void> {
  await fs.promises.appendFile(filePath, contents, 'utf8')
}

export interface CliDependencies {
  configureLogging: (options: LoggingOptions) => void
  checkDependencies: () => Promise<RequiredCommand[]>
  createSources: () => NetworkDataSources
  writeStdout: (text: string) => void
  writeStderr: (text: string) => void
  writeFile: (filePath: string, contents: string) => Promise<void>
  appendFile: (filePath: string, contents: string) => Promise<void>
}

const defaultDependencies: CliDependencies = {
  configureLogging,
  checkDependencies: () => checkDependencies(),
  createSources: () => createSystemDataSources(),
  writeStdout: (text) => {
    process.stdout.write(text)
  },
  writeStderr: (text) => {
    process.stderr.write(text)
  },
  writeFile: writeFileAtomic,
  appendFile
}

/**
 * Runs one analysis and resolves with the process exit code.
 */
export async function runCli(
  argv: readonly string[],
  overrides: Partial<CliDependencies> = {}
): Promise<ExitCode> {
  const deps: CliDependencies = { ...defaultDependencies, ...overrides }

  let options: CliOptions
  try {
    options = parseCliArgs(argv)
  } catch (error) {
    if (error instanceof CliUsageError) {
      deps.writeStderr(`Error: ${error.message}\n\n${USAGE}\n`)
      return ExitCode.InvalidArguments
    }
    throw error
  }

  if (options.help) {
    deps.writeStdout(`${USAGE}\n`)
    return ExitCode.Success
  }

  deps.configureLogging({ verbose: options.verbose, logFile: options.logFile })

  const missing = await deps.checkDependencies()
  if (missing.length > 0) {
    logger.error('Missing required dependencies - cannot continue', { missing })
    return ExitCode.MissingDependencies
  }

  try {
    logger.info('Starting network data collection...')
    const { interfaces } = await collectNetworkData(deps.createSources())

    if (interfaces.length === 0) {
      logger.error('No network interfaces found')
      return ExitCode.GeneralError
    }
    logger.info(`Successfully collected data for ${interfaces.length} interfaces`)

    if (options.exportFormat === 'json') {
      const json = exportToJson(interfaces)
      if (options.output) {
        await deps.writeFile(options.output, `${json}\n`)
        logger.info(`Exported to ${sanitizeForLog(options.output)}`)
      } else {
        deps.writeStdout(`${json}\n`)
      }
      return ExitCode.Success
    }

    deps.writeStdout(`${renderTable(interfaces)}\n`)
    if (options.logFile && options.verbose) {
      await deps.appendFile(options.logFile, `\n${renderTable(interfaces, { colors: false })}\n`)
    }
    return ExitCode.Success
  } catch (error) {
    logger.error('Error during execution', {
      error: sanitizeForLog(error instanceof Error ? error.message : error),
      stack: options.verbose && error instanceof Error ? error.stack : undefined
    })
    return ExitCode.GeneralError
  }
}
