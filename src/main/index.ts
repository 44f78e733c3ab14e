import { runCli } from '@app/cli'
import { registerProcessSignalHandlers } from '@app/lifecycle'
import { logger } from '@infra/logging'
import { ExitCode } from '@config/constants'

registerProcessSignalHandlers()

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code
  })
  .catch((error: unknown) => {
    logger.error('Unexpected failure', error instanceof Error ? { error: error.message } : { error })
    process.exitCode = ExitCode.GeneralError
  })
