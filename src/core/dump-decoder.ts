/**
 * Decoder for one dump record of a .ppf post-processor file.
 *
 * A dump has no self-describing schema: each field sits at the offset left
 * by the previous one, and several lengths come from counts read earlier in
 * the same dump. The five blocks are read strictly in this order (sizes in
 * 4-byte packets):
 *
 *   A  bounds     1 pad | 9 × int32 maxima | 2 pad
 *   B  header     name 8 | tbuf 2 | dbuf 2 | 1 pad | iver1 2 | iver2 2
 *                 machine 2 | time f64 (2) | ncycl | ialpha | nreg | nzone
 *                 ngroup | 5 pad | nppary | 8 pad
 *                 names 2×nppary | name padding 2×(npparmx − nppary)
 *                 group bounds f32×ngrpmx | group centers f32×ngrpmx
 *   C  materials  3 pad | ireg int32×nzone | 1 pad
 *                 per region: element count, then per element
 *                 fraction f64 | atomic number f64 | atomic weight f64
 *   D  globals    96 packets → 48 × f64
 *   E  arrays     2 pad | per name: 2 pad, then f64×(nzone + k)
 *
 * The decoder borrows the reader only for the duration of decodeDump();
 * the returned Dump holds no reference to it.
 */

import { debug, warn } from './logger'
import type { PacketReader } from './packet-reader'
import { MalformedHeaderError, UnsupportedArrayNameError } from './errors'
import {
  ARRAY_NAME_PACKETS,
  BUILTIN_ARRAY_FORMULAS,
  GLOBAL_BLOCK_PACKETS,
  NAME_PACKETS,
  PADDING,
  SHORT_STRING_PACKETS,
  arrayElementCount,
  lookupArray,
} from './dump-layout'
import type { ArrayFormulaTable } from './dump-layout'

// ---- Types ----

export interface DumpBounds {
  maxPhotonGroups: number
  maxIonTypes: number
  maxAtomicLevels: number
  maxMaterialsPerRegion: number
  maxPostProcessorArrays: number
  maxTransportParticles: number
  maxTransportReactions: number
  maxRegions: number
  maxZones: number
}

export interface DumpHeader {
  name: string
  timeBuffer: string
  dateBuffer: string
  version1: string
  version2: string
  machine: string
  /** Simulation time of this dump. */
  time: number
  cycle: number
  alpha: number
  regionCount: number
  zoneCount: number
  groupCount: number
  /** Declared number of post-processor arrays (NPPARY). */
  arrayCount: number
  arrayNames: readonly string[]
  groupBoundaries: readonly number[]
  groupCenters: readonly number[]
}

export interface MaterialElement {
  atomicFraction: number
  atomicNumber: number
  atomicWeight: number
}

/** Region number (1-based) → elements in file order. */
export type MaterialTable = ReadonlyMap<number, readonly Readonly<MaterialElement>[]>

export interface Dump {
  readonly bounds: Readonly<DumpBounds>
  readonly header: Readonly<DumpHeader>
  /** Region id of every zone (IREG). */
  readonly regionIds: readonly number[]
  readonly materials: MaterialTable
  /** Global scalar block, positional. */
  readonly globals: readonly number[]
  readonly arrays: ReadonlyMap<string, readonly number[]>
  /** Declared names that were passed over without reading. */
  readonly skippedArrays: readonly string[]
}

export type UnsupportedArrayPolicy = 'abort' | 'skip'

export interface DecodeOptions {
  arrayFormulas?: ArrayFormulaTable
  /**
   * What to do with a declared array that has no size formula. 'abort' fails
   * the dump; 'skip' reads nothing and carries on, after which the rest of
   * the dump is only correct if that array was empty on the wire.
   */
  unsupportedArrays?: UnsupportedArrayPolicy
}

// ---- Helpers ----

/** Fixed-width string fields are blank or NUL padded. */
function trimField(s: string): string {
  return s.replace(/[\s\0]+$/, '')
}

function freezeList<T>(items: T[]): readonly T[] {
  return Object.freeze(items)
}

// ---- Phases ----

function readBounds(r: PacketReader): DumpBounds {
  r.skip(PADDING.boundsLead)
  const bounds: DumpBounds = {
    maxPhotonGroups: r.read(1, 'int'),
    maxIonTypes: r.read(1, 'int'),
    maxAtomicLevels: r.read(1, 'int'),
    maxMaterialsPerRegion: r.read(1, 'int'),
    maxPostProcessorArrays: r.read(1, 'int'),
    maxTransportParticles: r.read(1, 'int'),
    maxTransportReactions: r.read(1, 'int'),
    maxRegions: r.read(1, 'int'),
    maxZones: r.read(1, 'int'),
  }
  r.skip(PADDING.boundsTrail)
  return bounds
}

function readHeader(r: PacketReader, bounds: DumpBounds): DumpHeader {
  const name = trimField(r.read(NAME_PACKETS, 'string'))
  const timeBuffer = trimField(r.read(SHORT_STRING_PACKETS, 'string'))
  const dateBuffer = trimField(r.read(SHORT_STRING_PACKETS, 'string'))
  r.skip(PADDING.afterDateBuffer)
  const version1 = trimField(r.read(SHORT_STRING_PACKETS, 'string'))
  const version2 = trimField(r.read(SHORT_STRING_PACKETS, 'string'))
  const machine = trimField(r.read(SHORT_STRING_PACKETS, 'string'))
  const time = r.read(2, 'double')
  const cycle = r.read(1, 'int')
  const alpha = r.read(1, 'int')
  const regionCount = r.read(1, 'int')
  const zoneCount = r.read(1, 'int')
  const groupCount = r.read(1, 'int')
  r.skip(PADDING.afterGroupCount)
  const arrayCount = r.read(1, 'int')
  r.skip(PADDING.afterArrayCount)

  const unusedSlots = bounds.maxPostProcessorArrays - arrayCount
  if (unusedSlots < 0) {
    throw new MalformedHeaderError(
      `Declared array count ${arrayCount} exceeds maximum ${bounds.maxPostProcessorArrays}`,
    )
  }

  const nameBlock = arrayCount > 0 ? r.read(ARRAY_NAME_PACKETS * arrayCount, 'string') : ''
  const arrayNames = nameBlock.split(/\s+/).filter(n => n.length > 0)
  if (arrayNames.length !== arrayCount) {
    throw new MalformedHeaderError(
      `Array name block holds ${arrayNames.length} name(s), header declares ${arrayCount}`,
    )
  }
  r.skip(ARRAY_NAME_PACKETS * unusedSlots, 'string')

  const groupBoundaries = r.read(bounds.maxPhotonGroups, 'float', true)
  const groupCenters = r.read(bounds.maxPhotonGroups, 'float', true)

  return {
    name,
    timeBuffer,
    dateBuffer,
    version1,
    version2,
    machine,
    time,
    cycle,
    alpha,
    regionCount,
    zoneCount,
    groupCount,
    arrayCount,
    arrayNames: freezeList(arrayNames),
    groupBoundaries: freezeList(groupBoundaries),
    groupCenters: freezeList(groupCenters),
  }
}

function readMaterials(r: PacketReader, header: DumpHeader): { regionIds: number[]; materials: Map<number, MaterialElement[]> } {
  r.skip(PADDING.materialLead)
  const regionIds = r.read(header.zoneCount, 'int', true)
  r.skip(PADDING.afterRegionIds)

  const materials = new Map<number, MaterialElement[]>()
  for (let region = 1; region <= header.regionCount; region++) {
    const elementCount = r.read(1, 'int')
    const elements: MaterialElement[] = []
    for (let i = 0; i < elementCount; i++) {
      elements.push(Object.freeze({
        atomicFraction: r.read(2, 'double'),
        atomicNumber: r.read(2, 'double'),
        atomicWeight: r.read(2, 'double'),
      }))
    }
    materials.set(region, elements)
  }
  return { regionIds, materials }
}

function readGlobals(r: PacketReader): number[] {
  return r.read(GLOBAL_BLOCK_PACKETS, 'double', true)
}

function readArrays(
  r: PacketReader,
  header: DumpHeader,
  table: ArrayFormulaTable,
  policy: UnsupportedArrayPolicy,
): { arrays: Map<string, readonly number[]>; skipped: string[] } {
  r.skip(PADDING.arraysLead, 'double')

  const arrays = new Map<string, readonly number[]>()
  const skipped: string[] = []

  for (const name of header.arrayNames) {
    r.skip(PADDING.perArray, 'double')
    const entry = lookupArray(name, table)
    switch (entry.kind) {
      case 'unsupported':
        if (policy === 'abort') throw new UnsupportedArrayNameError(name)
        warn(`[ppf] no size formula for array "${name}"; skipped without reading, later fields may be misaligned`)
        skipped.push(name)
        break
      case 'known': {
        const count = arrayElementCount(entry.formula, header.zoneCount)
        arrays.set(name, freezeList(r.read(2 * count, 'double', true)))
        break
      }
    }
  }
  return { arrays, skipped }
}

// ---- Public API ----

/**
 * Decode one dump starting at the reader's current position. On failure the
 * reader is left wherever the failing read stopped.
 */
export function decodeDump(reader: PacketReader, options: DecodeOptions = {}): Dump {
  const table = options.arrayFormulas ?? BUILTIN_ARRAY_FORMULAS
  const policy = options.unsupportedArrays ?? 'abort'
  const start = reader.position

  const bounds = readBounds(reader)
  const header = readHeader(reader, bounds)
  const { regionIds, materials } = readMaterials(reader, header)
  const globals = readGlobals(reader)
  const { arrays, skipped } = readArrays(reader, header, table, policy)

  debug(`[ppf] dump t=${header.time} cycle=${header.cycle} bytes ${start}..${reader.position}`)

  return Object.freeze({
    bounds: Object.freeze(bounds),
    header: Object.freeze(header),
    regionIds: freezeList(regionIds),
    materials: new Map(Array.from(materials, ([region, elements]) => [region, freezeList(elements)] as const)),
    globals: freezeList(globals),
    arrays,
    skippedArrays: freezeList(skipped),
  })
}
