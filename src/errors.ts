/**
 * Error taxonomy for verification runs.
 *
 * None of these mean "unsafe": unsafe removals are reported as FAIL partials.
 * They mean the question could not be answered from the data given.
 */

export class VerificationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The request cannot be evaluated (unsupported kind, non-host node, unresolved ancestor) */
export class InvalidArgumentError extends VerificationError {}

/** A name or unit id did not resolve */
export class NotFoundError extends VerificationError {}

/** A payload from Ceph or the inventory did not have the expected shape */
export class MalformedDataError extends VerificationError {
  readonly source: string;

  constructor(source: string, detail: string) {
    super(`Malformed ${source}: ${detail}`);
    this.source = source;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
