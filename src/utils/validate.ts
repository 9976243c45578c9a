import { z } from "zod";
import { ValidationError } from "./errors";

/**
 * Parse a request body against a zod schema.
 * Throws ValidationError (400) with one entry per failing field.
 */
export const parseBody = <S extends z.ZodTypeAny>(
  schema: S,
  body: unknown,
  message = "Invalid request body"
): z.infer<S> => {
  const result = schema.safeParse(body ?? {});
  if (result.success) return result.data;

  const details = result.error.issues.map((issue) => ({
    field: issue.path.join(".") || "body",
    message: issue.message,
  }));
  // Single-field failures read better as the top-level message
  throw new ValidationError(details.length === 1 ? details[0].message : message, details);
};
