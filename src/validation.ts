// Range checks for every animation option, shared by the CLI flags
// (cli.ts) and the config file loader (config/config.ts).

import { z } from "zod";
import { MAX_DEPTH } from "./rain/types.js";

function ratioSchema(label: string) {
  return z
    .number({ invalid_type_error: `${label} must be a number.` })
    .int(`${label} must be an integer between 1 and 10.`)
    .min(1, `${label} must be an integer between 1 and 10.`)
    .max(10, `${label} must be an integer between 1 and 10.`);
}

export const speedSchema = ratioSchema("Speed");
export const lengthSchema = ratioSchema("Length");
export const airSchema = ratioSchema("Air");

export const depthSchema = z
  .number({ invalid_type_error: "Depth must be a number." })
  .int(`Depth must be an integer between 0 and ${MAX_DEPTH}.`)
  .min(0, `Depth must be an integer between 0 and ${MAX_DEPTH}.`)
  .max(MAX_DEPTH, `Depth must be an integer between 0 and ${MAX_DEPTH}.`);

export const seedSchema = z
  .number({ invalid_type_error: "Seed must be a number." })
  .int("Seed must be a non-negative integer.")
  .min(0, "Seed must be a non-negative integer.")
  .max(0xffffffff, "Seed must fit in 32 bits.");

export const ticksSchema = z
  .number({ invalid_type_error: "Ticks must be a number." })
  .int("Ticks must be a positive integer.")
  .min(1, "Ticks must be a positive integer.")
  .max(100000, "Ticks must be at most 100000.");

export const sizeSchema = z
  .number({ invalid_type_error: "Size must be a number." })
  .int("Size must be a positive integer.")
  .min(1, "Size must be a positive integer.")
  .max(1000, "Size must be at most 1000.");

export const rainOptionsSchema = z.object({
  speed: speedSchema,
  depth: depthSchema,
  length: lengthSchema,
  air: airSchema,
  typing: z.boolean(),
  async: z.boolean(),
  old: z.boolean(),
});

export type RainOptions = z.infer<typeof rainOptionsSchema>;

export type ValidationResult<T> = { valid: true; value: T } | { valid: false; message: string };

/** Parses a decimal integer string and checks it against `schema`. */
export function parseIntOption(raw: string, schema: z.ZodType<number>): ValidationResult<number> {
  if (!/^-?\d+$/.test(raw.trim())) {
    return { valid: false, message: `'${raw}' is not an integer.` };
  }
  const result = schema.safeParse(Number(raw.trim()));
  if (!result.success) {
    return { valid: false, message: result.error.issues[0]?.message ?? "Invalid value." };
  }
  return { valid: true, value: result.data };
}
