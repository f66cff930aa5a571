import { App } from './App.js'
import { ConfigError } from '../config/index.js'
import { closeLogger, logger } from '../utils/logger.js'

const controller = new AbortController()

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    logger.info('Shutdown signal received', { signal })
    controller.abort()
  })
}

const app = new App()
app.start(controller.signal)
  .catch((error) => {
    if (error instanceof ConfigError) {
      logger.error('Missing or invalid configuration; exiting', { variables: error.variables, message: error.message })
    }
    else {
      logger.error('Fatal error', { error })
    }
    process.exitCode = 1
  })
  .finally(() => closeLogger())
