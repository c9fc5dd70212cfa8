/**
 * Input Validation
 *
 * Validates a raw container input against the Zod contract before any
 * reconciliation step runs. If validation fails, nothing is normalized and
 * a structured error is returned.
 */

import { containerInputSchema, type ContainerInput } from "@warden/contracts";
import { ValidationError } from "../errors/index.js";

/**
 * Returns the parsed input on success.
 * Throws a ValidationError carrying per-field issues on failure.
 */
export function validateContainerInput(input: unknown): ContainerInput {
  const result = containerInputSchema.safeParse(input);

  if (!result.success) {
    const fieldErrors = result.error.issues.map((issue) => ({
      field: issue.path.join("."),
      message: issue.message,
      code: issue.code,
    }));

    throw new ValidationError(
      "Container input failed validation",
      fieldErrors[0]?.field ?? "",
      fieldErrors
    );
  }

  return result.data;
}
