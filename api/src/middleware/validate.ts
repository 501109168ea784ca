import type { NextFunction, Request, Response } from "express";
import type { z, ZodTypeAny } from "zod";
import { objectIdSchema } from "@studyspots/shared";
import { InvalidInputError } from "../lib/errors.js";

/**
 * Parses a request value (usually the query string) with a shared zod schema
 * and returns the transformed value. Failures become a 400 with the per-field messages.
 */
export function parse<S extends ZodTypeAny>(schema: S, value: unknown): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const { formErrors, fieldErrors } = result.error.flatten();
    throw new InvalidInputError(
      formErrors[0] ?? "Validation failed",
      Object.keys(fieldErrors).length > 0 ? fieldErrors : undefined
    );
  }
  return result.data;
}

/**
 * Body validation middleware. The transformed value replaces `req.body`, so
 * handlers read camelCase fields with defaults applied.
 */
export function validate(schema: ZodTypeAny) {
  return (req: Request, _res: Response, next: NextFunction) => {
    req.body = parse(schema, req.body);
    next();
  };
}

/** Rejects path ids that are not 24-hex strings; returns them lowercased. */
export function parseId(value: string, label: string): string {
  const result = objectIdSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidInputError(`Invalid ${label} ID`);
  }
  return result.data;
}
