import { z } from 'zod';

/**
 * Success payload for operations that can fail but return nothing,
 * e.g. `Result<Unit, AppError>`. There is exactly one value: `unit`.
 */
export type Unit = Readonly<Record<never, never>>;

export const unit: Unit = Object.freeze({});

// Encodes as `{}`; any object decodes back to the single `unit` value.
export const unitSchema: z.ZodType<Unit, z.ZodTypeDef, unknown> = z.object({}).transform((): Unit => unit);
