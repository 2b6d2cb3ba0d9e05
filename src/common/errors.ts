export type MountErrorCode =
  | 'INVALID_COORDINATE'
  | 'OBJECT_NOT_FOUND'
  | 'COMMUNICATION'
  | 'PROTOCOL'
  | 'UNSUPPORTED_FORMAT';

export abstract class MountError extends Error {
  abstract readonly code: MountErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidCoordinateError extends MountError {
  readonly code = 'INVALID_COORDINATE';

  constructor(
    readonly axis: 'RA' | 'DEC',
    readonly input: unknown
  ) {
    super(`Invalid ${axis} coordinate: ${JSON.stringify(input)}`);
  }
}

export class ObjectNotFoundError extends MountError {
  readonly code = 'OBJECT_NOT_FOUND';

  constructor(readonly objectName: string) {
    super(`Object ${objectName} was not found.`);
  }
}

export class CommunicationError extends MountError {
  readonly code = 'COMMUNICATION';

  constructor(
    readonly url: string,
    options?: { cause?: unknown }
  ) {
    super(`Error in communication with the mount at ${url}. Check the address.`, options);
  }
}

export class ProtocolError extends MountError {
  readonly code = 'PROTOCOL';

  constructor(
    message: string,
    readonly reply?: string
  ) {
    super(message);
  }
}

export class UnsupportedFormatError extends MountError {
  readonly code = 'UNSUPPORTED_FORMAT';

  constructor(
    readonly byteLength: number,
    readonly expectedLength: number
  ) {
    super(`Unsupported framebuffer: ${byteLength} bytes, expected ${expectedLength}.`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
