/**
 * Packet-level reader for .ppf dump files.
 *
 * The format addresses everything in 4-byte packets. A read names a packet
 * count and the type the bytes are interpreted as; the item count follows
 * from the type size. All values are little-endian.
 *
 *   type    bytes/item   decoded as
 *   string  1            one UTF-8 string spanning the whole block
 *   int     4            uint32
 *   float   4            float32
 *   double  8            float64 (two packets per item)
 */

import type { ByteSource } from './byte-source'
import { MalformedPacketCountError, MalformedStringError } from './errors'

export const PACKET_SIZE = 4

export type PacketType = 'string' | 'int' | 'float' | 'double'

export interface PacketValue {
  string: string
  int: number
  float: number
  double: number
}

export const ITEM_SIZE: Readonly<Record<PacketType, number>> = Object.freeze({
  string: 1,
  int: 4,
  float: 4,
  double: 8,
})

function itemCount(packets: number, type: PacketType): number {
  const size = ITEM_SIZE[type]
  const bytes = packets * PACKET_SIZE
  if (!Number.isInteger(packets) || packets < 0 || bytes % size !== 0) {
    throw new MalformedPacketCountError(packets, size)
  }
  return bytes / size
}

const UTF8 = new TextDecoder('utf-8', { fatal: true })

function decodeString(buf: Buffer, offset: number): string {
  try {
    return UTF8.decode(buf)
  } catch (e) {
    throw new MalformedStringError(offset, buf.length, e)
  }
}

function decodeNumbers(buf: Buffer, type: Exclude<PacketType, 'string'>, count: number): number[] {
  const out = new Array<number>(count)
  for (let i = 0; i < count; i++) {
    switch (type) {
      case 'int': out[i] = buf.readUInt32LE(i * 4); break
      case 'float': out[i] = buf.readFloatLE(i * 4); break
      case 'double': out[i] = buf.readDoubleLE(i * 8); break
    }
  }
  return out
}

export class PacketReader {
  constructor(private readonly source: ByteSource) {}

  get position(): number { return this.source.position }
  get size(): number { return this.source.size }
  get remaining(): number { return this.source.size - this.source.position }

  read<T extends PacketType>(packets: number, type: T, asArray: true): PacketValue[T][]
  read<T extends PacketType>(packets: number, type: T, asArray?: false): PacketValue[T]
  read(packets: number, type: PacketType, asArray = false): PacketValue[PacketType] | PacketValue[PacketType][] {
    const count = itemCount(packets, type)
    if (!asArray && count === 0) throw new MalformedPacketCountError(packets, ITEM_SIZE[type])

    const offset = this.source.position
    const buf = this.source.take(packets * PACKET_SIZE)
    const items = type === 'string' ? [decodeString(buf, offset)] : decodeNumbers(buf, type, count)
    return asArray ? items : items[0]
  }

  /** Discard `packets` packets, checking they divide into `type` items. */
  skip(packets: number, type: PacketType = 'int'): void {
    itemCount(packets, type)
    this.source.skip(packets * PACKET_SIZE)
  }
}
