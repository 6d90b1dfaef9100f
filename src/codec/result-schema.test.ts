import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { Err, Ok } from '../shared/result.js';
import { ResultDecodeError } from './errors.js';
import { MISSING_TAG_MESSAGE, errSchema, getResultTypeInfo, okSchema, resultSchema } from './result-schema.js';

const booleanResult = resultSchema(z.boolean(), z.string());

const decodeIssues = (document: unknown, type: z.ZodTypeAny = booleanResult) => {
  const parsed = type.safeParse(document);
  if (parsed.success) throw new Error('Expected the document to be rejected');
  return ResultDecodeError.fromZodError(parsed.error).issues;
};

describe('resultSchema', () => {
  it('decodes the ok variant', () => {
    expect(booleanResult.parse({ $result: 'ok', value: true })).toEqual(Ok(true));
  });

  it('decodes the err variant', () => {
    expect(booleanResult.parse({ $result: 'err', error: 'something went wrong' })).toEqual(
      Err('something went wrong')
    );
  });

  it('ignores fields other than the discriminator and the selected payload', () => {
    const decoded = booleanResult.parse({ $result: 'err', error: 'x', value: true, traceId: 'abc' });
    expect(decoded).toEqual(Err('x'));
    expect(Object.keys(decoded)).toEqual(['ok', 'error']);
  });

  it('does not care where the discriminator sits', () => {
    expect(booleanResult.parse({ value: false, $result: 'ok' })).toEqual(Ok(false));
  });

  it('reports a missing discriminator', () => {
    expect(decodeIssues({ value: true })).toEqual([{ path: ['$result'], message: MISSING_TAG_MESSAGE }]);
  });

  it('treats a null discriminator as missing', () => {
    expect(decodeIssues({ $result: null, value: true })).toEqual([{ path: ['$result'], message: MISSING_TAG_MESSAGE }]);
  });

  it('reports an unknown discriminator', () => {
    expect(decodeIssues({ $result: 'bogus', value: 1 })).toEqual([
      { path: ['$result'], message: "Unknown result type 'bogus'; expected 'ok' or 'err'" },
    ]);
  });

  it('reports a discriminator that is not a string', () => {
    expect(decodeIssues({ $result: 1 })).toEqual([
      { path: ['$result'], message: "Unknown result type 1; expected 'ok' or 'err'" },
    ]);
  });

  it('is case-sensitive about the discriminator', () => {
    expect(decodeIssues({ $result: 'OK', value: true })).toEqual([
      { path: ['$result'], message: "Unknown result type 'OK'; expected 'ok' or 'err'" },
    ]);
  });

  it('rejects documents that are not objects', () => {
    expect(decodeIssues([true])).toEqual([{ path: [], message: 'Expected a Result document object' }]);
    expect(decodeIssues('ok')).toEqual([{ path: [], message: 'Expected a Result document object' }]);
  });

  it('reports payload issues under the payload field', () => {
    expect(decodeIssues({ $result: 'ok', value: 'yes' })).toEqual([
      { path: ['value'], message: 'Expected boolean, received string' },
    ]);
  });

  it('requires the selected payload to satisfy its schema when absent', () => {
    expect(decodeIssues({ $result: 'err' })).toEqual([{ path: ['error'], message: 'Required' }]);
  });

  it('accepts an absent payload when its schema allows undefined', () => {
    const optionalValue = resultSchema(z.number().optional(), z.string());
    expect(optionalValue.parse({ $result: 'ok' })).toEqual(Ok(undefined));
  });

  it('prefixes nested payload paths', () => {
    const userResult = resultSchema(z.object({ name: z.string() }), z.string());
    expect(decodeIssues({ $result: 'ok', value: { name: 7 } }, userResult)).toEqual([
      { path: ['value', 'name'], message: 'Expected string, received number' },
    ]);
  });

  it('decodes nested Results', () => {
    const inner = resultSchema(z.number(), z.string());
    const outer = resultSchema(inner, z.string());
    expect(outer.parse({ $result: 'ok', value: { $result: 'err', error: 'inner failure' } })).toEqual(
      Ok(Err('inner failure'))
    );
  });
});

describe('okSchema and errSchema', () => {
  it('decode the matching variant', () => {
    expect(okSchema(booleanResult).parse({ $result: 'ok', value: true })).toEqual(Ok(true));
    expect(errSchema(booleanResult).parse({ $result: 'err', error: 'no' })).toEqual(Err('no'));
  });

  it('reject the other variant', () => {
    expect(decodeIssues({ $result: 'err', error: 'no' }, okSchema(booleanResult))).toEqual([
      { path: ['$result'], message: "Expected the 'ok' variant, got 'err'" },
    ]);
    expect(decodeIssues({ $result: 'ok', value: true }, errSchema(booleanResult))).toEqual([
      { path: ['$result'], message: "Expected the 'err' variant, got 'ok'" },
    ]);
  });

  it('decode what their parent decodes for the matching variant', () => {
    const document = { $result: 'ok', value: false };
    expect(okSchema(booleanResult).parse(document)).toEqual(booleanResult.parse(document));
  });

  it('report the parent issues first', () => {
    expect(decodeIssues({ value: true }, okSchema(booleanResult))).toEqual([
      { path: ['$result'], message: MISSING_TAG_MESSAGE },
    ]);
  });

  it('need a parent built by resultSchema', () => {
    expect(() => okSchema(z.unknown().transform(() => Ok(1)))).toThrow(TypeError);
  });
});

describe('getResultTypeInfo', () => {
  const valueType = z.number();
  const errorType = z.string();
  const numberResult = resultSchema(valueType, errorType);

  it('describes a Result descriptor', () => {
    expect(getResultTypeInfo(numberResult)).toEqual({ resultType: numberResult, valueType, errorType });
  });

  it('resolves a variant descriptor to its parent', () => {
    const info = getResultTypeInfo(errSchema(numberResult));
    expect(info?.resultType).toBe(numberResult);
    expect(info?.valueType).toBe(valueType);
    expect(info?.errorType).toBe(errorType);
  });

  it('recognises descriptors renamed with describe()', () => {
    expect(getResultTypeInfo(numberResult.describe('NumberResult'))?.resultType).toBe(numberResult);
    expect(getResultTypeInfo(okSchema(numberResult).describe('NumberOk'))?.resultType).toBe(numberResult);
  });

  it('accepts a renamed parent for variant descriptors', () => {
    const variant = errSchema(numberResult.describe('NumberResult'));
    expect(getResultTypeInfo(variant)?.resultType).toBe(numberResult);
    expect(variant.parse({ $result: 'err', error: 'late' })).toEqual(Err('late'));
  });

  it('does not treat a refinement of a Result descriptor as one', () => {
    expect(getResultTypeInfo(numberResult.refine((result) => result.ok))).toBeUndefined();
  });

  it('returns undefined for other descriptors', () => {
    expect(getResultTypeInfo(z.string())).toBeUndefined();
    expect(getResultTypeInfo(numberResult.optional())).toBeUndefined();
  });
});
