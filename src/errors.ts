/**
 * Distinguishes why a universe or planner configuration was rejected.
 */
export type ConfigErrorKind =
  | "EmptyRehearsalSlots"
  | "InvalidCapacity"
  | "OverlappingTiers"
  | "PreferenceOutsideAvailability"
  | "UnknownReference"
  | "DuplicateId"
  | "InvalidOptions"
  | "SchemaViolation";

export interface ConfigIssue {
  readonly path: string;
  readonly message: string;
}

/**
 * Error thrown when a universe descriptor or planner options are malformed.
 *
 * Raised at load time, before any search starts. Values are never coerced:
 * a non-positive `maxDancers` is rejected here rather than defaulted.
 *
 * @category Errors
 */
export class ConfigError extends Error {
  public readonly kind: ConfigErrorKind;
  /** Id of the offending piece or dancer, when there is one. */
  public readonly entityId: string | undefined;
  public readonly issues: readonly ConfigIssue[];

  constructor(
    kind: ConfigErrorKind,
    message: string,
    options: { entityId?: string; issues?: readonly ConfigIssue[] } = {},
  ) {
    super(message);
    this.name = "ConfigError";
    this.kind = kind;
    this.entityId = options.entityId;
    this.issues = options.issues ?? [];
  }
}
