/**
 * RFC 9457 Problem Details for HTTP APIs
 * https://www.rfc-editor.org/rfc/rfc9457.html
 *
 * Wire format used when an HTTP caller translates a control plane error.
 */

import { z } from "zod";
import type { ArmadaError } from "../base.js";
import { ValidationError } from "../bases/validation-error.js";
import { ERROR_CATALOG } from "../catalog.js";
import { wrapError } from "../utils.js";

export const ValidationIssueSchema = z.object({
  field: z.string(),
  message: z.string(),
  code: z.string(),
  value: z.unknown().optional(),
});

export const ProblemDetailsSchema = z.object({
  type: z.string(),
  title: z.string(),
  status: z.number().int().min(100).max(599),
  detail: z.string().optional(),
  instance: z.string().optional(),
  code: z.string().optional(),
  traceId: z.string().optional(),
  timestamp: z.string().optional(),
  domain: z.string().optional(),
  metadata: z.record(z.string()).optional(),
  errors: z.array(ValidationIssueSchema).optional(),
});

export type ProblemDetails = z.infer<typeof ProblemDetailsSchema>;

/**
 * Serialize an error to RFC 9457 ProblemDetails.
 * Uses `.code` as the `type` discriminator; unknown errors become INTERNAL_ERROR.
 */
export function toProblemDetails(error: unknown, instance?: string): ProblemDetails {
  const armadaError: ArmadaError = wrapError(error);
  const problem: ProblemDetails = {
    type: `/errors/${armadaError.code}`,
    title: ERROR_CATALOG[armadaError.code].title,
    status: armadaError.httpStatus,
    detail: armadaError.message,
    code: armadaError.code,
    domain: armadaError.domain,
    timestamp: armadaError.timestamp.toISOString(),
  };
  if (instance !== undefined) problem.instance = instance;
  if (armadaError.traceId !== undefined) problem.traceId = armadaError.traceId;
  if (armadaError.metadata !== undefined) problem.metadata = armadaError.metadata;

  if (armadaError instanceof ValidationError && armadaError.issues.length > 0) {
    problem.errors = armadaError.issues.map((issue) => ({ ...issue }));
  }

  return problem;
}
