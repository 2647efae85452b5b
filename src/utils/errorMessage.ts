import { z } from 'zod';

const withMessage = z.object({ message: z.string() });

/**
 * Message of anything thrown. Reads the `message` field by shape, since
 * errors raised by Node internals may come from another realm and fail
 * `instanceof Error`.
 */
export function errorMessage(error: unknown, fallback = 'Unknown error'): string {
  const parsed = withMessage.safeParse(error);
  return parsed.success ? parsed.data.message : fallback;
}

export default errorMessage;
