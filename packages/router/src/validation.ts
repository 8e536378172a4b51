/**
 * Argument and configuration schemas.
 */

import { z } from "zod";
import { isLogger } from "@trellis/core";
import type { Logger } from "@trellis/core";
import { InvalidArgumentError } from "./errors.ts";
import type { Handler, Requisite } from "./types.ts";

export const stringArg = z.string();

export const booleanArg = z.boolean();

export const handlerArg = z.custom<Handler>(
  (value) => typeof value === "function",
  "Expected a function",
);

export const requisiteArg = z.custom<Requisite>(
  (value) => typeof value === "function",
  "Expected a function",
);

export const filterArg = z.union([z.string(), z.instanceof(RegExp)]);

export const prefixSchema = z
  .string()
  .refine((value) => value === "" || value.startsWith("/"), {
    message: 'Prefix must start with a forward slash ("/")',
  })
  .refine((value) => !value.endsWith("/"), {
    message: 'Prefix must not end with a forward slash ("/")',
  });

const loggerConfigSchema = z
  .object({
    level: z
      .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
      .optional(),
    name: z.string().optional(),
    timestamp: z.boolean().optional(),
    json: z.boolean().optional(),
  })
  .strict();

export const routerOptionsSchema = z
  .object({
    prefix: prefixSchema.default(""),
    strictRequisites: z.boolean().default(false),
    notFoundPattern: z.string().default("404"),
    logger: z
      .union([z.custom<Logger>(isLogger, "Expected a logger"), loggerConfigSchema])
      .optional(),
  })
  .strict();

export type ResolvedRouterOptions = z.output<typeof routerOptionsSchema>;

/**
 * Parse `value` with `schema`, throwing InvalidArgumentError on failure.
 *
 * @param label Prefix for the error message, e.g. `Method "match" argument 1`
 */
export function assertArgument<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  value: unknown,
  label: string,
): z.output<TSchema> {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues.map((issue) => ({
    field: issue.path.join(".") || "(root)",
    message: issue.message,
    code: issue.code,
  }));
  const message = issues
    .map((issue) =>
      issue.field === "(root)" ? issue.message : `${issue.field}: ${issue.message}`
    )
    .join(", ");

  throw new InvalidArgumentError(`${label}: ${message}`, { issues });
}
