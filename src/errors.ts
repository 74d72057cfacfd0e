import { err, ok } from './result';
import type { Result } from './result';

export type JerErrorCode =
  | 'UNRESOLVED_TYPE'
  | 'UNSUPPORTED_EXTENSION'
  | 'INVALID_DESCRIPTOR'
  | 'ENCODE_ERROR'
  | 'MISSING_REQUIRED_FIELD'
  | 'DECODE_ERROR'
  | 'MALFORMED_WIRE'
  | 'RECURSION_LIMIT';

/**
 * Base class for every failure this package reports.
 * `path` is a JSON pointer to the offending value for encode/decode errors
 * ('' is the root value) and is left undefined for compile-time errors.
 */
export abstract class JerError extends Error {
  abstract readonly code: JerErrorCode;
  readonly path?: string;

  constructor(message: string, path?: string) {
    super(path ? `${message} (at ${path})` : message);
    this.name = new.target.name;
    this.path = path;
  }
}

/** A named type is not defined in its module or in any module it imports from. */
export class UnresolvedTypeError extends JerError {
  readonly code = 'UNRESOLVED_TYPE';

  constructor(
    readonly typeName: string,
    readonly moduleName: string,
    reason?: string,
  ) {
    super(reason ?? `Type '${typeName}' not found in module '${moduleName}'.`);
  }
}

/** Members were declared after an extension marker. */
export class UnsupportedExtensionError extends JerError {
  readonly code = 'UNSUPPORTED_EXTENSION';

  constructor(readonly memberName: string) {
    super(`Extension addition '${memberName}' is not supported; no members may follow '...'.`);
  }
}

/** The descriptor model is malformed. */
export class InvalidDescriptorError extends JerError {
  readonly code = 'INVALID_DESCRIPTOR';
}

export class EncodeError extends JerError {
  readonly code: JerErrorCode = 'ENCODE_ERROR';
}

/** A required SEQUENCE/SET member is absent from the value being encoded. */
export class MissingRequiredFieldError extends EncodeError {
  readonly code = 'MISSING_REQUIRED_FIELD';

  constructor(
    readonly fieldName: string,
    path: string,
  ) {
    super(`Missing required member '${fieldName}'.`, path);
  }
}

export class DecodeError extends JerError {
  readonly code = 'DECODE_ERROR';
}

/** The wire bytes are not valid UTF-8 or not valid JSON text. */
export class MalformedWireError extends JerError {
  readonly code = 'MALFORMED_WIRE';
}

/** Nesting went deeper than the configured maxDepth. */
export class RecursionLimitError extends JerError {
  readonly code = 'RECURSION_LIMIT';

  constructor(
    readonly maxDepth: number,
    path?: string,
  ) {
    super(`Nesting exceeds the maximum depth of ${maxDepth}.`, path);
  }
}

/**
 * Run an operation that throws JerErrors and return its outcome as a Result.
 * Errors of any other class are defects and propagate.
 */
export function toJerResult<T>(operation: () => T): Result<T, JerError> {
  try {
    return ok(operation());
  } catch (e) {
    if (e instanceof JerError) {
      return err(e);
    }
    throw e;
  }
}
