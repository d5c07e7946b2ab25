import { z } from 'zod';

import type { PrintSettingsOverrides } from './print-settings.js';

const wrapThresholdSchema = z.number().int().positive().nullable().optional();

/**
 * Validates print settings coming from configuration files or the command line.
 * Unknown keys are rejected so that typos surface instead of being ignored.
 */
export const printSettingsSchema = z
  .object({
    colored: z.boolean().optional(),
    indentAmount: z.number().int().nonnegative().optional(),
    maxDepth: z
      .number()
      .int()
      .nonnegative()
      .or(z.literal(Number.POSITIVE_INFINITY))
      .optional(),
    newLineChar: z.string().min(1).optional(),
    printSuffix: z.boolean().optional(),
    byteLimit: z.number().int().nonnegative().optional(),
    rainbowBracket: z.boolean().optional(),
    radix: z.enum(['hex', 'dec', 'oct', 'bin']).optional(),
    forceNewLine: z.boolean().optional(),
    listWrap: wrapThresholdSchema,
    arrayWrap: wrapThresholdSchema,
    recordWrap: wrapThresholdSchema,
    tupleWrap: wrapThresholdSchema,
  })
  .strict();

export type PrintSettingsInput = z.input<typeof printSettingsSchema>;

/**
 * Parses untrusted settings into overrides for `resolvePrintSettings`.
 *
 * @param source - Label used in the error message, such as a file path.
 * @throws {Error} When the value does not match the settings schema.
 */
export function parsePrintSettings(value: unknown, source = 'print settings'): PrintSettingsOverrides {
  const result = printSettingsSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid ${source}: ${issues}`);
  }
  return result.data;
}
