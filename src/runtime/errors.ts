export type FleetErrorKind =
  | "transport"
  | "filter_config"
  | "materialization"
  | "prerequisite_missing"
  | "root_unavailable"
  | "invalid_config";

export class FleetError extends Error {
  readonly kind: FleetErrorKind;

  constructor(kind: FleetErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "FleetError";
    this.kind = kind;
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === "object" && error !== null && "code" in error;
}

export function toErrorMessage(error: unknown, fallback = "unknown error"): string {
  if (error instanceof Error && error.message.trim() !== "") {
    return error.message;
  }
  return fallback;
}
