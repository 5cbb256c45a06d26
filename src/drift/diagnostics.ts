/**
 * Diagnostics: recoverable conditions captured during a comparison run.
 */

import type { DriftError, DriftErrorCode } from "./errors.js";
import { DuplicateEntityError, NormalizationError, UnknownEntityTypeError } from "./errors.js";

export interface Diagnostic {
  severity: "warning" | "error";
  code: DriftErrorCode;
  message: string;
  entity?: { type: string; name: string };
  path?: string;
  /** Source locations or regions involved (duplicates name both). */
  origins?: string[];
}

export function diagnosticFromError(err: DriftError): Diagnostic {
  if (err instanceof NormalizationError) {
    return {
      severity: "warning",
      code: err.code,
      message: err.message,
      entity: err.entity,
      path: err.path,
    };
  }
  if (err instanceof DuplicateEntityError) {
    return {
      severity: "error",
      code: err.code,
      message: err.message,
      origins: [...err.origins],
    };
  }
  if (err instanceof UnknownEntityTypeError) {
    return {
      severity: "error",
      code: err.code,
      message: err.message,
      entity: { type: err.entityType, name: err.entityName },
    };
  }
  return { severity: "error", code: err.code, message: err.message };
}
