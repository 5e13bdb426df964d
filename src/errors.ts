/**
 * Error kinds shared by validation and apply.
 */

export type ValidationErrorKind =
  | "InvalidScheme"
  | "NameCollision"
  | "InvalidCharacter"
  | "ExistingFileConflict";

export type ApplyErrorKind =
  | "SourceMissing"
  | "PermissionDenied"
  | "ExistingFileConflict"
  | "FilesystemOther";

export type RenameErrorKind = ValidationErrorKind | ApplyErrorKind;

export class RenameError extends Error {
  readonly kind: RenameErrorKind;

  constructor(kind: RenameErrorKind, message: string) {
    super(message);
    this.name = "RenameError";
    this.kind = kind;
  }
}

/** Thrown before generation when a scheme has out-of-range or unknown fields. */
export class InvalidSchemeError extends RenameError {
  constructor(message: string) {
    super("InvalidScheme", message);
    this.name = "InvalidSchemeError";
  }
}

/** Thrown by applyPlan when the conflict report still blocks execution. */
export class PlanRejectedError extends RenameError {
  constructor(kind: ValidationErrorKind, message: string) {
    super(kind, message);
    this.name = "PlanRejectedError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
