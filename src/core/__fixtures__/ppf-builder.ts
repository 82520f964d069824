/**
 * Test-only encoder that lays out synthetic dumps the way the decoder
 * expects to find them. Padding packets are filled with a recognisable
 * marker so a misaligned read shows up as a wrong value.
 */

import type { MaterialElement } from '../dump-decoder'
import { BUILTIN_ARRAY_FORMULAS } from '../dump-layout'

export const PAD_MARKER = 0x7e7e7e7e

export interface FixtureDump {
  time: number
  cycle?: number
  zoneCount: number
  regionCount: number
  regionIds: number[]
  arrayNames: string[]
  /** Header maximum for post-processor arrays; defaults to arrayNames.length + 2. */
  maxArrays?: number
  /** Photon group maximum; defaults to 2. */
  maxGroups?: number
  /** Elements per region, region 1 first. Defaults to one hydrogen element per region. */
  materials?: MaterialElement[][]
  /** Values per array name. Built-in names default to k + time for element k. */
  arrays?: Record<string, number[]>
  globals?: number[]
  name?: string
  machine?: string
}

class PacketWriter {
  private readonly parts: Buffer[] = []

  int(v: number): this {
    const b = Buffer.alloc(4)
    b.writeInt32LE(v)
    this.parts.push(b)
    return this
  }

  ints(vs: number[]): this {
    for (const v of vs) this.int(v)
    return this
  }

  float(v: number): this {
    const b = Buffer.alloc(4)
    b.writeFloatLE(v)
    this.parts.push(b)
    return this
  }

  double(v: number): this {
    const b = Buffer.alloc(8)
    b.writeDoubleLE(v)
    this.parts.push(b)
    return this
  }

  text(s: string, packets: number): this {
    const width = packets * 4
    if (Buffer.byteLength(s) > width) throw new Error(`"${s}" does not fit in ${packets} packets`)
    this.parts.push(Buffer.from(s.padEnd(width, ' '), 'utf8'))
    return this
  }

  pad(packets: number): this {
    for (let i = 0; i < packets; i++) this.int(PAD_MARKER)
    return this
  }

  toBuffer(): Buffer {
    return Buffer.concat(this.parts)
  }
}

export function defaultArrayValues(name: string, zoneCount: number, time: number): number[] {
  const formula = BUILTIN_ARRAY_FORMULAS[name]
  if (!formula) return []
  return Array.from({ length: zoneCount + formula.offset }, (_, k) => k + time)
}

export function encodeDump(d: FixtureDump): Buffer {
  const maxArrays = d.maxArrays ?? d.arrayNames.length + 2
  const maxGroups = d.maxGroups ?? 2
  const materials = d.materials
    ?? Array.from({ length: d.regionCount }, () => [{ atomicFraction: 1, atomicNumber: 1, atomicWeight: 1.008 }])
  const w = new PacketWriter()

  // bounds
  w.pad(1)
  w.ints([maxGroups, 3, 5, 4, maxArrays, 0, 0, d.regionCount, d.zoneCount])
  w.pad(2)

  // header
  w.text(d.name ?? 'synthetic run', 8)
  w.text('12:00:00', 2)
  w.text('01/02/03', 2)
  w.pad(1)
  w.text('PP.11', 2)
  w.text('rev7', 2)
  w.text(d.machine ?? 'linux', 2)
  w.double(d.time)
  w.ints([d.cycle ?? 0, 1, d.regionCount, d.zoneCount, maxGroups])
  w.pad(5)
  w.int(d.arrayNames.length)
  w.pad(8)
  w.text(d.arrayNames.map(n => n.padEnd(8, ' ')).join(''), 2 * d.arrayNames.length)
  w.text('', 2 * (maxArrays - d.arrayNames.length))
  for (let g = 0; g < maxGroups; g++) w.float(g + 0.5)
  for (let g = 0; g < maxGroups; g++) w.float(g + 0.25)

  // materials
  w.pad(3)
  w.ints(d.regionIds)
  w.pad(1)
  for (const elements of materials) {
    w.int(elements.length)
    for (const el of elements) w.double(el.atomicFraction).double(el.atomicNumber).double(el.atomicWeight)
  }

  // globals
  const globals = d.globals ?? Array.from({ length: 48 }, (_, i) => i * 0.5)
  if (globals.length !== 48) throw new Error('globals block holds 48 doubles')
  for (const g of globals) w.double(g)

  // named arrays
  w.pad(2)
  for (const name of d.arrayNames) {
    w.pad(2)
    const values = d.arrays?.[name] ?? defaultArrayValues(name, d.zoneCount, d.time)
    for (const v of values) w.double(v)
  }

  return w.toBuffer()
}

/** Concatenate dumps with the 4-byte separator after each one. */
export function encodeFile(dumps: FixtureDump[]): Buffer {
  const parts: Buffer[] = []
  for (const d of dumps) {
    parts.push(encodeDump(d))
    const sep = Buffer.alloc(4)
    sep.writeUInt32LE(PAD_MARKER)
    parts.push(sep)
  }
  return Buffer.concat(parts)
}

export function simpleDump(time: number, overrides: Partial<FixtureDump> = {}): FixtureDump {
  return {
    time,
    cycle: Math.round(time * 10),
    zoneCount: 3,
    regionCount: 2,
    regionIds: [1, 1, 2],
    arrayNames: ['R', 'RCM', 'PRES', 'RHO'],
    ...overrides,
  }
}
