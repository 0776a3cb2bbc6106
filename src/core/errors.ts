export type ErrorKind = "InvalidFormat" | "EnvironmentError" | "InstallerError" | "DependencyError";

export type Diagnostic = {
  kind: ErrorKind;
  subject: string;
  message: string;
};

export type Result<T> = { ok: true; value: T } | { ok: false; error: Diagnostic };

export class VenvsyncError extends Error {
  constructor(
    readonly kind: ErrorKind,
    readonly subject: string,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }

  toDiagnostic(): Diagnostic {
    return { kind: this.kind, subject: this.subject, message: this.message };
  }
}

export class InvalidFormatError extends VenvsyncError {
  constructor(subject: string, message = `Invalid format: ${subject}`) {
    super("InvalidFormat", subject, message);
  }
}

export class EnvironmentError extends VenvsyncError {
  constructor(subject: string, message: string) {
    super("EnvironmentError", subject, message);
  }
}

export class InstallerError extends VenvsyncError {
  constructor(subject: string, message: string) {
    super("InstallerError", subject, message);
  }
}

export class DependencyError extends VenvsyncError {
  constructor(subject: string, message: string) {
    super("DependencyError", subject, message);
  }
}

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T>(kind: ErrorKind, subject: string, message: string): Result<T> {
  return { ok: false, error: { kind, subject, message } };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
