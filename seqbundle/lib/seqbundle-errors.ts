import { ErrorSpecific } from "./common-types";

export class SeqbundleError extends Error {
  constructor(
    message: string,
    public specifics: ErrorSpecific[] = [],
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * An archive could not be read as a zip container.
 */
export class ArchiveError extends SeqbundleError {}

/**
 * A lookup in the artifact -> sample -> project chain failed for
 * a reason other than the record not existing.
 */
export class ResolutionError extends SeqbundleError {}

/**
 * Uploading a bundle, or flipping its published flag, failed.
 */
export class UploadError extends SeqbundleError {}

/**
 * The run cannot even begin (e.g. the step itself cannot be fetched).
 */
export class FatalError extends SeqbundleError {}

/**
 * A LIMS record was missing fields we cannot do without.
 */
export class ParseError extends SeqbundleError {}

export class ConfigError extends SeqbundleError {}

export class LimsRequestError extends SeqbundleError {
  constructor(
    message: string,
    public status?: number,
    specifics: ErrorSpecific[] = [],
  ) {
    super(message, specifics);
  }
}

/**
 * True if the error represents the LIMS telling us a record does not exist
 * (as opposed to us not being allowed to see it, or the server falling over).
 */
export function isNotFound(e: unknown): boolean {
  return e instanceof LimsRequestError && e.status === 404;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
