import { fromAsyncResult } from '../async/result-async.js'
import { loadConfig } from '../shared/config.js'
import { logger } from '../shared/logger.js'
import { match } from '../shared/result.js'
import { AppError, describeAppError } from './errors.js'
import { createFakeOrderServices } from './fake-services.js'
import { createOrderPipeline } from './order-pipeline.js'

const ORDER_SCENARIOS = [
  'order-1', // success
  'order-2', // InsufficientStock
  'order-3', // UserNotFound
  'order-4', // UserServiceCrashed
  'order-5', // InventoryServiceCrashed
  'order-missing', // OrderNotFound
  'crash', // OrderServiceCrashed
] as const

export const runTypedErrorsDemo = async (): Promise<void> => {
  const { demo } = loadConfig()
  const pipeline = createOrderPipeline(createFakeOrderServices(demo.latencyMs))

  logger.info('=== Typed Errors Demo ===')

  const styles = [
    { label: 'fluent', run: pipeline.processOrder },
    { label: 'bind', run: pipeline.processOrderBound },
  ]

  for (const { label, run } of styles) {
    logger.info(`processOrder scenarios (${label}):`)
    for (const scenario of ORDER_SCENARIOS) {
      const result = await fromAsyncResult(() => run(scenario), AppError.fromException)
      const output = match(result, {
        ok: (message) => `SUCCESS: ${message}`,
        err: describeAppError,
      })
      logger.info(`  processOrder("${scenario}"): ${output}`)
    }
  }
}
