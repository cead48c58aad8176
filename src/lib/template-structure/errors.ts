/**
 * Error taxonomy for template structure extraction.
 *
 * Only PackageError is fatal. The others are raised close to the element
 * being read and caught by its extractor, which substitutes a fallback.
 */

/** The input is not an OOXML word-processing package. */
export class PackageError extends Error {
  constructor(
    message: string,
    readonly source: string,
    options?: { cause?: unknown }
  ) {
    super(`${message}: ${source}`, options);
    this.name = "PackageError";
  }
}

/** An optional package part was requested but is not in the archive. */
export class PartMissingError extends Error {
  constructor(readonly partPath: string) {
    super(`Package part not found: ${partPath}`);
    this.name = "PartMissingError";
  }
}

/** A numeric attribute could not be parsed. */
export class MalformedAttributeError extends Error {
  constructor(
    readonly element: string,
    readonly attribute: string,
    readonly value: string
  ) {
    super(`Malformed ${element}/@${attribute} value "${value}"`);
    this.name = "MalformedAttributeError";
  }
}

/**
 * Run `read`, replacing a MalformedAttributeError with `fallback`.
 * Any other error propagates.
 */
export function recoverMalformed<T>(
  scope: string,
  read: () => T,
  fallback: T
): T {
  try {
    return read();
  } catch (err) {
    if (!(err instanceof MalformedAttributeError)) throw err;
    console.warn(`[template-structure/${scope}] ${err.message}; using fallback`);
    return fallback;
  }
}
