/**
 * Sequential byte sources for the packet reader.
 *
 * A source owns a read cursor. File sources keep the descriptor open until
 * close() and read positionally on demand.
 */

import { openSync, readSync, fstatSync, closeSync } from 'fs'
import { StreamExhaustedError } from './errors'

export interface ByteSource {
  /** Total length of the source in bytes. */
  readonly size: number
  /** Current cursor offset in bytes. */
  readonly position: number
  /** Read exactly `length` bytes and advance. The cursor does not move on failure. */
  take(length: number): Buffer
  /** Advance without decoding. The cursor does not move on failure. */
  skip(length: number): void
  readonly closed: boolean
  close(): void
}

export type SourceInput = string | Buffer | Uint8Array | ByteSource

function checkAvailable(position: number, size: number, length: number): void {
  if (length < 0 || position + length > size) {
    throw new StreamExhaustedError(position, length, size - position)
  }
}

export class BufferSource implements ByteSource {
  private readonly data: Buffer
  private offset = 0
  private released = false

  constructor(data: Buffer | Uint8Array) {
    this.data = Buffer.isBuffer(data) ? data : Buffer.from(data.buffer, data.byteOffset, data.byteLength)
  }

  get size(): number { return this.data.length }
  get position(): number { return this.offset }
  get closed(): boolean { return this.released }

  take(length: number): Buffer {
    checkAvailable(this.offset, this.data.length, length)
    const out = Buffer.from(this.data.subarray(this.offset, this.offset + length))
    this.offset += length
    return out
  }

  skip(length: number): void {
    checkAvailable(this.offset, this.data.length, length)
    this.offset += length
  }

  close(): void {
    this.released = true
  }
}

export class FileSource implements ByteSource {
  public readonly filepath: string
  public readonly size: number

  private fd: number | null
  private offset = 0

  constructor(filepath: string) {
    this.filepath = filepath
    const fd = openSync(filepath, 'r')
    let size: number
    try {
      size = fstatSync(fd).size
    } catch (e) {
      closeSync(fd)
      throw e
    }
    this.size = size
    this.fd = fd
  }

  get position(): number { return this.offset }

  get closed(): boolean { return this.fd === null }

  take(length: number): Buffer {
    checkAvailable(this.offset, this.size, length)
    const fd = this.descriptor()
    const out = Buffer.alloc(length)
    let filled = 0
    while (filled < length) {
      const n = readSync(fd, out, filled, length - filled, this.offset + filled)
      if (n === 0) throw new StreamExhaustedError(this.offset, length, filled)
      filled += n
    }
    this.offset += length
    return out
  }

  skip(length: number): void {
    checkAvailable(this.offset, this.size, length)
    this.offset += length
  }

  close(): void {
    if (this.fd === null) return
    closeSync(this.fd)
    this.fd = null
  }

  private descriptor(): number {
    if (this.fd === null) throw new Error(`File source already closed: ${this.filepath}`)
    return this.fd
  }
}

function isByteSource(input: SourceInput): input is ByteSource {
  return typeof input === 'object' && 'take' in input && typeof input.take === 'function'
}

export function openSource(input: SourceInput): ByteSource {
  if (typeof input === 'string') return new FileSource(input)
  if (isByteSource(input)) return input
  return new BufferSource(input)
}
