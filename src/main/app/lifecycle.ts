import { logger } from '@infra/logging'
import { ExitCode } from '@config/constants'

export function registerProcessSignalHandlers(
  exit: (code: ExitCode) => void = (code) => process.exit(code)
): void {
  const handleSignal = (signal: NodeJS.Signals): void => {
    logger.error(`Received ${signal}, interrupted by user`)
    exit(ExitCode.GeneralError)
  }

  process.once('SIGINT', handleSignal)
  process.once('SIGTERM', handleSignal)
}
