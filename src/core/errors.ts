/**
 * Error types raised while reading .ppf dump files.
 *
 * Every error carries a stable `code` so callers can branch on the failure
 * kind without relying on message text.
 */

export type PpfErrorCode =
  | 'STREAM_EXHAUSTED'
  | 'MALFORMED_PACKET_COUNT'
  | 'UNSUPPORTED_ARRAY_NAME'
  | 'MALFORMED_HEADER'
  | 'MALFORMED_STRING'
  | 'DUMP_DECODE_FAILED'
  | 'ARRAY_NOT_FOUND'
  | 'EMPTY_COLLECTION'
  | 'CONFIG_INVALID'

export abstract class PpfError extends Error {
  abstract readonly code: PpfErrorCode

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

export class StreamExhaustedError extends PpfError {
  readonly code = 'STREAM_EXHAUSTED'

  constructor(
    public readonly offset: number,
    public readonly requested: number,
    public readonly available: number,
  ) {
    super(`Stream exhausted at offset ${offset}: requested ${requested} bytes, ${available} remain`)
  }
}

export class MalformedPacketCountError extends PpfError {
  readonly code = 'MALFORMED_PACKET_COUNT'

  constructor(
    public readonly packets: number,
    public readonly itemSize: number,
  ) {
    super(`${packets} packet(s) (${packets * 4} bytes) do not divide into ${itemSize}-byte items`)
  }
}

export class UnsupportedArrayNameError extends PpfError {
  readonly code = 'UNSUPPORTED_ARRAY_NAME'

  constructor(public readonly arrayName: string) {
    super(`No size formula for array "${arrayName}"; its encoded length cannot be determined`)
  }
}

export class MalformedHeaderError extends PpfError {
  readonly code = 'MALFORMED_HEADER'
}

export class MalformedStringError extends PpfError {
  readonly code = 'MALFORMED_STRING'

  constructor(
    public readonly offset: number,
    public readonly length: number,
    cause: unknown,
  ) {
    super(`String field of ${length} bytes at offset ${offset} is not valid UTF-8`, { cause })
  }
}

/** Wraps whatever aborted a single dump with where that dump began. */
export class DumpDecodeError extends PpfError {
  readonly code = 'DUMP_DECODE_FAILED'

  constructor(
    public readonly dumpIndex: number,
    public readonly dumpOffset: number,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`Dump ${dumpIndex} (starting at byte ${dumpOffset}) failed to decode: ${reason}`, { cause })
  }
}

export class ArrayNotFoundError extends PpfError {
  readonly code = 'ARRAY_NOT_FOUND'

  constructor(
    public readonly arrayName: string,
    public readonly dumpIndex: number,
  ) {
    super(`Array "${arrayName}" is missing from dump ${dumpIndex}`)
  }
}

export class EmptyCollectionError extends PpfError {
  readonly code = 'EMPTY_COLLECTION'

  constructor(operation: string) {
    super(`Cannot ${operation}: the collection holds no dumps`)
  }
}

export class ConfigError extends PpfError {
  readonly code = 'CONFIG_INVALID'
}
