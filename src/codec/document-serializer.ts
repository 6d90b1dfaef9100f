import { z } from 'zod';
import { bigIntReplacer, isJsonObject, parseJson } from '../shared/json-utils.js';
import { ResultDecodeError } from './errors.js';
import { resultConverterFactory } from './result-converter.js';
import type {
  AnyTypeDescriptor,
  DocumentConverter,
  DocumentSerializer,
  SerializerOptions,
  TypeDescriptor,
} from './types.js';

// Wrappers whose values have the shape of the descriptor they wrap. A transform's
// output has no descriptor to encode it with, so it is written as-is.
const innerDescriptor = (type: AnyTypeDescriptor): AnyTypeDescriptor | undefined => {
  if (type instanceof z.ZodOptional || type instanceof z.ZodNullable) return type.unwrap();
  if (type instanceof z.ZodDefault) return type.removeDefault();
  if (type instanceof z.ZodCatch) return type.removeCatch();
  if (type instanceof z.ZodReadonly || type instanceof z.ZodBranded) return type.unwrap();
  if (type instanceof z.ZodLazy) return type.schema;
  if (type instanceof z.ZodEffects && type._def.effect.type !== 'transform') return type.innerType();
  return undefined;
};

/**
 * Generic document serializer. Values whose descriptor a converter factory claims
 * are written by that converter. Container descriptors (objects, arrays, tuples,
 * records, maps and unions) and wrapper descriptors (optional, nullable, default,
 * catch, readonly, branded, lazy, refinements) are walked so nested Results are
 * found; anything else is written as-is. Decoding is the descriptor's own schema.
 *
 * @example
 * ```typescript
 * const serializer = createDocumentSerializer()
 * serializer.stringify(Ok(true), resultSchema(z.boolean(), z.string()))
 * // '{"$result":"ok","value":true}'
 * ```
 */
export const createDocumentSerializer = (options: SerializerOptions = {}): DocumentSerializer => {
  const factories = [...(options.converters ?? []), resultConverterFactory];
  // null marks a descriptor no factory claims
  const resolved = new WeakMap<AnyTypeDescriptor, DocumentConverter | null>();

  const resolve = (type: AnyTypeDescriptor): DocumentConverter | undefined => {
    const cached = resolved.get(type);
    if (cached !== undefined) return cached ?? undefined;

    const factory = factories.find((candidate) => candidate.canConvert(type));
    const converter = factory ? factory.createConverter(type) : undefined;
    resolved.set(type, converter ?? null);
    return converter;
  };

  // The first member whose encoding its own schema accepts
  const encodeUnionMember = (value: unknown, members: AnyTypeDescriptor[]): unknown => {
    for (const member of members) {
      let encoded: unknown;
      try {
        encoded = encodeAny(value, member);
      } catch (error) {
        // A converter refusing the value rules the member out
        if (!(error instanceof TypeError)) throw error;
        continue;
      }
      if (member.safeParse(encoded).success) return encoded;
    }
    return value;
  };

  const encodeAny = (value: unknown, type: AnyTypeDescriptor): unknown => {
    const converter = resolve(type);
    if (converter) return converter.write(value, serializer);

    if (value === undefined || value === null) return value;

    const inner = innerDescriptor(type);
    if (inner) return encodeAny(value, inner);

    if (type instanceof z.ZodArray && Array.isArray(value)) {
      const elementType: AnyTypeDescriptor = type.element;
      return value.map((item: unknown) => encodeAny(item, elementType));
    }
    if (type instanceof z.ZodTuple && Array.isArray(value)) {
      const items: AnyTypeDescriptor[] = type.items;
      const rest: AnyTypeDescriptor | null = type._def.rest;
      return value.map((item: unknown, index) => {
        const itemType = index < items.length ? items[index] : rest;
        return itemType ? encodeAny(item, itemType) : item;
      });
    }
    if (type instanceof z.ZodObject && isJsonObject(value)) {
      const shape: Record<string, AnyTypeDescriptor> = type.shape;
      return Object.fromEntries(
        Object.entries(value).map(([key, field]): [string, unknown] => [
          key,
          Object.hasOwn(shape, key) ? encodeAny(field, shape[key]) : field,
        ])
      );
    }
    if (type instanceof z.ZodRecord && isJsonObject(value)) {
      const valueType: AnyTypeDescriptor = type.valueSchema;
      return Object.fromEntries(
        Object.entries(value).map(([key, field]): [string, unknown] => [key, encodeAny(field, valueType)])
      );
    }
    if (type instanceof z.ZodMap && value instanceof Map) {
      const keyType: AnyTypeDescriptor = type.keySchema;
      const valueType: AnyTypeDescriptor = type.valueSchema;
      return new Map(
        Array.from(value, ([key, field]: [unknown, unknown]): [unknown, unknown] => [
          encodeAny(key, keyType),
          encodeAny(field, valueType),
        ])
      );
    }
    if (type instanceof z.ZodUnion || type instanceof z.ZodDiscriminatedUnion) {
      const members: AnyTypeDescriptor[] = type.options;
      return encodeUnionMember(value, members);
    }
    return value;
  };

  const decode = <T>(document: unknown, type: TypeDescriptor<T>): T => {
    const parsed = type.safeParse(document);
    if (!parsed.success) {
      throw ResultDecodeError.fromZodError(parsed.error);
    }
    return parsed.data;
  };

  const parse = <T>(text: string, type: TypeDescriptor<T>): T => {
    let document: unknown;
    try {
      document = parseJson(text);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ResultDecodeError([{ path: [], message: `Malformed JSON: ${message}` }], { cause: error });
    }
    return decode(document, type);
  };

  const serializer: DocumentSerializer = {
    resolve,
    encode: (value, type) => encodeAny(value, type),
    decode,
    stringify: (value, type) => JSON.stringify(encodeAny(value, type), bigIntReplacer),
    parse,
  };

  return serializer;
};
