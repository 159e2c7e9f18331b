import { ValidationError } from "./bases/validation-error.js";
import type { ValidationIssue } from "./types.js";

/**
 * Thrown when the control plane configuration fails schema validation.
 */
export class ControlPlaneConfigError extends ValidationError<"CONFIG_INVALID"> {
  constructor(issues: readonly ValidationIssue[]) {
    super({
      code: "CONFIG_INVALID",
      message: `Invalid control plane configuration: ${issues
        .map((issue) => `${issue.field}: ${issue.message}`)
        .join("; ")}`,
      issues,
    });
  }
}
