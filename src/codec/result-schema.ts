import { z } from 'zod';
import { Ok, Err, type Ok as OkVariant, type Err as ErrVariant, type Result } from '../shared/result.js';
import { isJsonObject } from '../shared/json-utils.js';
import type { AnyTypeDescriptor, ResultTypeInfo, TypeDescriptor } from './types.js';

export const RESULT_TAG_FIELD = '$result';
export const OK_TAG = 'ok';
export const ERR_TAG = 'err';
export const VALUE_FIELD = 'value';
export const ERROR_FIELD = 'error';

export const MISSING_TAG_MESSAGE =
  `Missing '${RESULT_TAG_FIELD}' discriminator; expected {"$result":"ok","value":...} or {"$result":"err","error":...}`;

// Registrations are keyed by the descriptor's transform effect, which clones made by
// `.describe()` share with the descriptor they were made from.
// Result descriptors and the payload descriptors they were built from
const resultTypes = new WeakMap<object, ResultTypeInfo>();
// Variant descriptors and their declared parent Result descriptor
const variantParents = new WeakMap<object, AnyTypeDescriptor>();

const effectOf = (type: AnyTypeDescriptor): object | undefined =>
  type instanceof z.ZodEffects ? type._def.effect : undefined;

const describeTag = (tag: unknown): string => (typeof tag === 'string' ? `'${tag}'` : JSON.stringify(tag));

const decodePayload = <P>(
  type: TypeDescriptor<P>,
  payload: unknown,
  field: string,
  ctx: z.RefinementCtx
): z.SafeParseReturnType<unknown, P> => {
  const parsed = type.safeParse(payload);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [field, ...issue.path], message: issue.message });
    }
  }
  return parsed;
};

/**
 * Descriptor for `Result<T, E>` on the wire:
 * `{"$result":"ok","value":<T>}` or `{"$result":"err","error":<E>}`.
 *
 * Fields other than the discriminator and the selected payload are ignored.
 */
export const resultSchema = <T, E>(
  valueType: TypeDescriptor<T>,
  errorType: TypeDescriptor<E>
): TypeDescriptor<Result<T, E>> => {
  const schema = z.unknown().transform((document, ctx): Result<T, E> => {
    if (!isJsonObject(document)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected a Result document object' });
      return z.NEVER;
    }

    const tag = document[RESULT_TAG_FIELD];
    if (tag === undefined || tag === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [RESULT_TAG_FIELD], message: MISSING_TAG_MESSAGE });
      return z.NEVER;
    }

    if (tag === OK_TAG) {
      const parsed = decodePayload(valueType, document[VALUE_FIELD], VALUE_FIELD, ctx);
      return parsed.success ? Ok(parsed.data) : z.NEVER;
    }

    if (tag === ERR_TAG) {
      const parsed = decodePayload(errorType, document[ERROR_FIELD], ERROR_FIELD, ctx);
      return parsed.success ? Err(parsed.data) : z.NEVER;
    }

    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: [RESULT_TAG_FIELD],
      message: `Unknown result type ${describeTag(tag)}; expected '${OK_TAG}' or '${ERR_TAG}'`,
    });
    return z.NEVER;
  });

  resultTypes.set(schema._def.effect, { resultType: schema, valueType, errorType });
  return schema;
};

const assertResultType = (parent: AnyTypeDescriptor): void => {
  if (getResultTypeInfo(parent) === undefined) {
    throw new TypeError('Variant descriptors need a parent created by resultSchema()');
  }
};

// Decodes through the parent and rejects the `err` variant
export const okSchema = <T, E>(parent: TypeDescriptor<Result<T, E>>): TypeDescriptor<OkVariant<T>> => {
  assertResultType(parent);
  const schema = parent.transform((result, ctx): OkVariant<T> => {
    if (result.ok) return result;
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: [RESULT_TAG_FIELD],
      message: `Expected the '${OK_TAG}' variant, got '${ERR_TAG}'`,
    });
    return z.NEVER;
  });
  variantParents.set(schema._def.effect, parent);
  return schema;
};

// Decodes through the parent and rejects the `ok` variant
export const errSchema = <T, E>(parent: TypeDescriptor<Result<T, E>>): TypeDescriptor<ErrVariant<E>> => {
  assertResultType(parent);
  const schema = parent.transform((result, ctx): ErrVariant<E> => {
    if (!result.ok) return result;
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: [RESULT_TAG_FIELD],
      message: `Expected the '${ERR_TAG}' variant, got '${OK_TAG}'`,
    });
    return z.NEVER;
  });
  variantParents.set(schema._def.effect, parent);
  return schema;
};

/**
 * Tells whether a descriptor denotes a Result, either directly or as one of its
 * two variants, and returns the Result descriptor with its payload descriptors.
 * A descriptor renamed with `.describe()` resolves like the one it was made from.
 */
export const getResultTypeInfo = (type: AnyTypeDescriptor): ResultTypeInfo | undefined => {
  const effect = effectOf(type);
  if (effect === undefined) return undefined;
  const parent = variantParents.get(effect);
  return parent ? getResultTypeInfo(parent) : resultTypes.get(effect);
};
