/**
 * Drift error taxonomy.
 *
 * Only DuplicateEntityError aborts work, and only for one entity type group;
 * everything else is captured as a diagnostic on the report.
 */

export type DriftErrorCode =
  | "normalization"
  | "duplicate_entity"
  | "unknown_entity_type"
  | "policy"
  | "config";

export abstract class DriftError extends Error {
  abstract readonly code: DriftErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Raw input does not have the shape its entity type expects. */
export class NormalizationError extends DriftError {
  readonly code = "normalization";

  constructor(
    readonly entity: { type: string; name: string },
    readonly path: string,
    reason: string,
  ) {
    super(`${entity.type} '${entity.name}' at '${path || "$"}': ${reason}`);
  }
}

/** Two entities on the same side share an identity key. */
export class DuplicateEntityError extends DriftError {
  readonly code = "duplicate_entity";

  constructor(
    readonly source: "declared" | "live",
    readonly identityKey: string,
    readonly origins: [string, string],
  ) {
    super(
      `Duplicate ${source} entity '${identityKey}' (first: ${origins[0]}, second: ${origins[1]})`,
    );
  }
}

/** An entity type outside the policy's enumerated set reached the engine. */
export class UnknownEntityTypeError extends DriftError {
  readonly code = "unknown_entity_type";

  constructor(
    readonly source: "declared" | "live",
    readonly entityType: string,
    readonly entityName: string,
  ) {
    super(`Unknown ${source} entity type '${entityType}' for '${entityName}'`);
  }
}

/** Policy file is unreadable or fails validation. */
export class PolicyError extends DriftError {
  readonly code = "policy";

  constructor(
    message: string,
    readonly issues: Array<{ path: string; message: string }> = [],
  ) {
    super(message);
  }
}

/** Configuration file is unreadable or fails validation. */
export class ConfigError extends DriftError {
  readonly code = "config";

  constructor(
    message: string,
    readonly issues: Array<{ path: string; message: string }> = [],
  ) {
    super(message);
  }
}
