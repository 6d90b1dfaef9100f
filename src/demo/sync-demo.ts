import { logger } from '../shared/logger.js'
import { Err, Ok, andThen, from, fromNullable, map, match, type Result } from '../shared/result.js'
import { toError } from '../shared/fault.js'

export const parseNumber = (input: string): Result<number, string> =>
  /^-?\d+$/.test(input.trim()) ? Ok(Number.parseInt(input, 10)) : Err(`'${input}' is not a valid number`)

export const divide = (a: number, b: number): Result<number, string> =>
  b === 0 ? Err('division by zero') : Ok(Math.trunc(a / b))

const show = (result: Result<number | string, string>): string =>
  match(result, { ok: (value) => `Got ${value}`, err: (error) => error })

export const runSyncDemo = (): void => {
  logger.info('=== Result Type Demo ===')

  const parsed = parseNumber('42')
  const rejected = parseNumber('abc')

  logger.info('Match demo:')
  logger.info(`  parseNumber("42"): ${show(parsed)}`)
  logger.info(`  parseNumber("abc"): ${show(rejected)}`)

  logger.info('Map demo:')
  logger.info(`  map(parsed, n => n * 2): ${show(map(parsed, (n) => n * 2))}`)
  logger.info(`  map(rejected, n => n * 2): ${show(map(rejected, (n) => n * 2))}`)

  logger.info('AndThen demo:')
  logger.info(`  parseNumber("50") then divide by 2: ${show(andThen(parseNumber('50'), (n) => divide(n, 2)))}`)
  logger.info(`  parseNumber("50") then divide by 0: ${show(andThen(parseNumber('50'), (n) => divide(n, 0)))}`)
  logger.info(`  parseNumber("abc") then divide by 2: ${show(andThen(parseNumber('abc'), (n) => divide(n, 2)))}`)

  logger.info('from demo:')
  const parseStrict = (text: string): number => {
    const value: unknown = JSON.parse(text)
    if (typeof value !== 'number') throw new TypeError(`${text} is not a number`)
    return value
  }
  logger.info(`  from(() => parseStrict("42")): ${show(from(() => parseStrict('42'), (fault) => toError(fault).message))}`)
  logger.info(`  from(() => parseStrict("abc")): ${show(from(() => parseStrict('abc'), (fault) => toError(fault).message))}`)

  logger.info('fromNullable demo:')
  const names: Partial<Record<string, string>> = { first: 'Alice' }
  logger.info(`  fromNullable(42): ${show(fromNullable<number, string>(42, 'number was null'))}`)
  logger.info(`  fromNullable(null): ${show(fromNullable<number, string>(null, 'number was null'))}`)
  logger.info(`  fromNullable(names.first): ${show(fromNullable(names['first'], 'name was missing'))}`)
  logger.info(`  fromNullable(names.second): ${show(fromNullable(names['second'], 'name was missing'))}`)
}
