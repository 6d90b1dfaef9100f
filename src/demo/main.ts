import { logger } from '../shared/logger.js'
import { runAsyncDemo } from './async-demo.js'
import { runSyncDemo } from './sync-demo.js'
import { runTypedErrorsDemo } from './typed-errors-demo.js'

const main = async () => {
  runSyncDemo()
  await runAsyncDemo()
  await runTypedErrorsDemo()
}

// Run the main function
main().catch((error) => {
  logger.error('Unhandled error at main execution level:', error)
  process.exit(1)
})
