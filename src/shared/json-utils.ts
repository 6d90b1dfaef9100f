/**
 * JSON.stringify replacer function to convert BigInt values to strings.
 * Pair it with `z.coerce.bigint()` on the decoding side.
 * @param _key The key being serialized (unused, following convention).
 * @param value The value being serialized.
 * @returns The original value, or the string representation if the value is a BigInt.
 */
export const bigIntReplacer = (_key: string, value: unknown): unknown => {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  return value;
};

/**
 * JSON.parse without the `any`: the parsed document is `unknown` until a schema has looked at it.
 */
export const parseJson = (text: string): unknown => JSON.parse(text);

export const isJsonObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);
