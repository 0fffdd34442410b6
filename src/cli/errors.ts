/**
 * Error types raised by foundry
 *
 * Missing content and failed writes are not thrown: they are reported as
 * values in a DeploymentReport. Only conditions that must stop the operation
 * that triggered them are modelled as exceptions.
 */

export type FoundryErrorKind = "validation" | "schema";

export class FoundryError extends Error {
  readonly kind: FoundryErrorKind;

  constructor(args: { kind: FoundryErrorKind; message: string }) {
    super(args.message);
    this.name = "FoundryError";
    this.kind = args.kind;
  }
}

/**
 * Rejected user input, raised before any filesystem mutation
 */
export class ValidationError extends FoundryError {
  constructor(message: string) {
    super({ kind: "validation", message });
    this.name = "ValidationError";
  }
}

/**
 * A JSON document that does not match its schema
 */
export class SchemaError extends FoundryError {
  readonly filePath: string;
  readonly details: Array<string>;

  constructor(args: {
    filePath: string;
    message: string;
    details?: Array<string> | null;
  }) {
    super({ kind: "schema", message: args.message });
    this.name = "SchemaError";
    this.filePath = args.filePath;
    this.details = args.details ?? [];
  }
}

/**
 * Extract a printable message from an unknown thrown value
 * @param err - Caught value
 *
 * @returns The error message
 */
export const describeError = (err: unknown): string => {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
};
