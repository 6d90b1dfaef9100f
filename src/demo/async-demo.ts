import { createAsyncResult, fromAsync, fromAsyncResult } from '../async/result-async.js'
import { loadConfig } from '../shared/config.js'
import { logger } from '../shared/logger.js'
import { Err, Ok, fromNullable, match, type Result } from '../shared/result.js'
import { DemoError } from './errors.js'

const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

const DemoResult = createAsyncResult(DemoError)

const show = <T>(result: Result<T, DemoError>): string =>
  match(result, { ok: (value) => `Got ${String(value)}`, err: (error) => error.message })

export const runAsyncDemo = async (): Promise<void> => {
  const { demo } = loadConfig()
  logger.info('=== AsyncResult Demo ===')

  // Simulates a DB call that can fail with a typed error
  const getNumber = async (shouldFail: boolean): Promise<Result<number, DemoError>> => {
    await sleep(demo.latencyMs)
    return shouldFail ? Err(DemoError.of('DB unavailable')) : Ok(42)
  }

  // Simulates a DB call that crashes
  const getNumberThrows = async (): Promise<Result<number, DemoError>> => {
    await sleep(demo.latencyMs)
    throw new Error('Connection timeout!')
  }

  const format = async (n: number): Promise<string> => {
    await sleep(demo.latencyMs)
    return `Formatted: ${n}`
  }

  const formatThrows = async (_n: number): Promise<string> => {
    await sleep(demo.latencyMs)
    throw new Error('Formatter service down!')
  }

  const validate = async (n: number, outcome: 'ok' | 'fail' | 'throw'): Promise<Result<string, DemoError>> => {
    await sleep(demo.latencyMs)
    if (outcome === 'throw') throw new Error('Validation service crashed!')
    return outcome === 'fail' ? Err(DemoError.of('Number too small')) : Ok(`Valid: ${n}`)
  }

  logger.info('Async map (sync f):')
  logger.info(`  getNumber(ok) map n * 2: ${show(await DemoResult.map(getNumber(false), (n) => n * 2))}`)
  logger.info(`  getNumber(fail) map n * 2: ${show(await DemoResult.map(getNumber(true), (n) => n * 2))}`)
  logger.info(`  getNumberThrows() map n * 2: ${show(await DemoResult.map(getNumberThrows(), (n) => n * 2))}`)

  logger.info('Async map (async f):')
  logger.info(`  getNumber(ok) map format: ${show(await DemoResult.map(getNumber(false), format))}`)
  logger.info(`  getNumber(fail) map format: ${show(await DemoResult.map(getNumber(true), format))}`)
  logger.info(`  getNumber(ok) map formatThrows: ${show(await DemoResult.map(getNumber(false), formatThrows))}`)
  logger.info(`  getNumberThrows() map format: ${show(await DemoResult.map(getNumberThrows(), format))}`)

  logger.info('Async andThen:')
  logger.info(`  getNumber(ok) andThen validate ok: ${show(await DemoResult.andThen(getNumber(false), (n) => validate(n, 'ok')))}`)
  logger.info(`  getNumber(ok) andThen validate fail: ${show(await DemoResult.andThen(getNumber(false), (n) => validate(n, 'fail')))}`)
  logger.info(`  getNumber(fail) andThen validate ok: ${show(await DemoResult.andThen(getNumber(true), (n) => validate(n, 'ok')))}`)
  logger.info(`  getNumber(ok) andThen validate throws: ${show(await DemoResult.andThen(getNumber(false), (n) => validate(n, 'throw')))}`)
  logger.info(`  getNumberThrows() andThen validate ok: ${show(await DemoResult.andThen(getNumberThrows(), (n) => validate(n, 'ok')))}`)

  logger.info('fromAsync:')
  const externalApi = async (shouldThrow: boolean): Promise<number> => {
    await sleep(demo.latencyMs)
    if (shouldThrow) throw new Error('Service unavailable!')
    return 100
  }
  const toDemoError = (fault: unknown): DemoError => DemoError.of(fault instanceof Error ? fault.message : String(fault))
  logger.info(`  fromAsync(externalApi ok): ${show(await fromAsync(() => externalApi(false), toDemoError))}`)
  logger.info(`  fromAsync(externalApi throws): ${show(await fromAsync(() => externalApi(true), toDemoError))}`)

  logger.info('fromAsyncResult with typed errors and crash handling:')
  const lookup = async (mode: 'ok' | 'notfound' | 'crash'): Promise<number | null> => {
    await sleep(demo.latencyMs)
    if (mode === 'crash') throw new Error('DB connection lost!')
    return mode === 'ok' ? 42 : null
  }
  const getNumberSafe = (mode: 'ok' | 'notfound' | 'crash'): Promise<Result<number, DemoError>> =>
    fromAsyncResult(
      async () => fromNullable(await lookup(mode), DemoError.of('Number not found')),
      (fault) => DemoError.of(`DB crashed: ${fault instanceof Error ? fault.message : String(fault)}`)
    )
  for (const mode of ['ok', 'notfound', 'crash'] as const) {
    logger.info(`  getNumberSafe(${mode}): ${show(await getNumberSafe(mode))}`)
  }

  logger.info('Async match:')
  const handlers = { ok: (n: number) => `Got ${n}`, err: (error: DemoError) => error.message }
  logger.info(`  getNumber(ok) match: ${await DemoResult.match(getNumber(false), handlers)}`)
  logger.info(`  getNumber(fail) match: ${await DemoResult.match(getNumber(true), handlers)}`)
  logger.info(`  getNumberThrows() match: ${await DemoResult.match(getNumberThrows(), handlers)}`)
}
