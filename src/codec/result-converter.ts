import { isResult } from '../shared/result.js';
import { logger } from '../shared/logger.js';
import { ERR_TAG, OK_TAG, getResultTypeInfo } from './result-schema.js';
import type { AnyTypeDescriptor, ConverterFactory, DocumentConverter, DocumentSerializer, ResultDocument } from './types.js';

export const createResultConverter = (
  valueType: AnyTypeDescriptor,
  errorType: AnyTypeDescriptor
): DocumentConverter => {
  const write = (value: unknown, serializer: DocumentSerializer): ResultDocument => {
    if (!isResult(value)) {
      throw new TypeError('Expected a Result value for a Result type descriptor');
    }
    // Discriminator first, then the single payload field
    return value.ok
      ? { $result: OK_TAG, value: serializer.encode(value.value, valueType) }
      : { $result: ERR_TAG, error: serializer.encode(value.error, errorType) };
  };

  return { write };
};

// One converter per Result descriptor, shared by its variant descriptors
const converters = new WeakMap<AnyTypeDescriptor, DocumentConverter>();

export const resultConverterFactory: ConverterFactory = {
  canConvert: (type) => getResultTypeInfo(type) !== undefined,

  createConverter: (type) => {
    const info = getResultTypeInfo(type);
    if (!info) {
      throw new TypeError('Cannot create a Result converter for a descriptor that is not a Result or one of its variants');
    }

    const cached = converters.get(info.resultType);
    if (cached) return cached;

    const converter = createResultConverter(info.valueType, info.errorType);
    converters.set(info.resultType, converter);
    logger.debug(`[ResultCodec] Created converter for Result<${info.valueType.description ?? 'unnamed'}, ${info.errorType.description ?? 'unnamed'}>`);
    return converter;
  },
};
