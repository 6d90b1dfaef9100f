export {
  Ok,
  Err,
  isOk,
  isErr,
  isResult,
  match,
  map,
  andThen,
  bind,
  fromNullable,
  from,
} from './shared/result.js'
export type { Result, MatchHandlers } from './shared/result.js'

export { unit, unitSchema } from './shared/unit.js'
export type { Unit } from './shared/unit.js'

export { toError, errorFromException } from './shared/fault.js'
export type { FromException } from './shared/fault.js'

export { createAsyncResult, fromAsync, fromAsyncResult } from './async/result-async.js'
export type { AsyncResult, AsyncResultChain, Deferred, MapStep, AndThenStep } from './async/types.js'

export {
  resultSchema,
  okSchema,
  errSchema,
  getResultTypeInfo,
  MISSING_TAG_MESSAGE,
  RESULT_TAG_FIELD,
  OK_TAG,
  ERR_TAG,
  VALUE_FIELD,
  ERROR_FIELD,
} from './codec/result-schema.js'
export { createResultConverter, resultConverterFactory } from './codec/result-converter.js'
export { createDocumentSerializer } from './codec/document-serializer.js'
export { ResultDecodeError } from './codec/errors.js'
export type { DecodeIssue } from './codec/errors.js'
export type {
  TypeDescriptor,
  AnyTypeDescriptor,
  ResultDocument,
  ResultTypeInfo,
  DocumentConverter,
  ConverterFactory,
  DocumentSerializer,
  SerializerOptions,
} from './codec/types.js'

export { loadConfig } from './shared/config.js'
export type { Config } from './shared/config.js'
export { logger, createLogger } from './shared/logger.js'
