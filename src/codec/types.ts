import type { z } from 'zod';

// Runtime description of a type: a zod schema that decodes documents into T
export type TypeDescriptor<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export type AnyTypeDescriptor = z.ZodTypeAny;

export type ResultDocument =
  | { $result: 'ok'; value: unknown }
  | { $result: 'err'; error: unknown };

export type ResultTypeInfo = {
  // The Result descriptor itself, also when resolved from a variant descriptor
  resultType: AnyTypeDescriptor;
  valueType: AnyTypeDescriptor;
  errorType: AnyTypeDescriptor;
};

export type DocumentConverter = {
  write: (value: unknown, serializer: DocumentSerializer) => unknown;
};

/**
 * Claims descriptors and builds the converters that write their values.
 * Converters only write: reading a document is always the descriptor's own
 * schema, so a variant descriptor decodes through its parent Result descriptor
 * and then checks the variant.
 */
export type ConverterFactory = {
  canConvert: (type: AnyTypeDescriptor) => boolean;
  createConverter: (type: AnyTypeDescriptor) => DocumentConverter;
};

export type DocumentSerializer = {
  resolve: (type: AnyTypeDescriptor) => DocumentConverter | undefined;
  encode: <T>(value: T, type: TypeDescriptor<T>) => unknown;
  decode: <T>(document: unknown, type: TypeDescriptor<T>) => T;
  stringify: <T>(value: T, type: TypeDescriptor<T>) => string;
  parse: <T>(text: string, type: TypeDescriptor<T>) => T;
};

export type SerializerOptions = {
  // Consulted in order, before the built-in Result converter
  converters?: ConverterFactory[];
};
