/**
 * Time-ordered collection of the dumps in a .ppf file.
 *
 * load() walks the file dump by dump. A dump that fails to decode ends the
 * walk: the dumps before it are kept and the failure is reported, or, in
 * strict mode, rethrown. The collection cannot be changed after load.
 */

import { basename } from 'path'
import { log, warn, error } from './logger'
import { openSource } from './byte-source'
import type { SourceInput } from './byte-source'
import { PacketReader } from './packet-reader'
import { decodeDump } from './dump-decoder'
import type { DecodeOptions, Dump, MaterialTable, UnsupportedArrayPolicy } from './dump-decoder'
import { DUMP_SEPARATOR_BYTES, BUILTIN_ARRAY_FORMULAS, extendArrayFormulas } from './dump-layout'
import { ArrayNotFoundError, DumpDecodeError, EmptyCollectionError } from './errors'

export interface LoadOptions {
  /** Rethrow the first decode failure instead of returning a partial result. */
  strict?: boolean
  unsupportedArrays?: UnsupportedArrayPolicy
  /** Extra name → offset size formulas (element count = nzone + offset). */
  arrayFormulas?: Record<string, number>
}

export interface LoadReport {
  source: string
  bytesConsumed: number
  totalBytes: number
  /** True when every byte of the source was accounted for. */
  complete: boolean
  /** The failure that ended the walk early, if any. */
  failure: DumpDecodeError | null
}

export interface CollectionSummary {
  dumpCount: number
  zoneCount: number | null
  regionCount: number | null
  groupCount: number | null
  arrayNames: readonly string[]
  firstTime: number | null
  lastTime: number | null
  firstCycle: number | null
  lastCycle: number | null
}

export const REGION_MISMATCH_MESSAGE =
  'zone region ids were imported incorrectly (distinct IREG values do not match NREG); ' +
  'this is a known artifact of runs using ionization models'

function describeSource(input: SourceInput): string {
  if (typeof input === 'string') return basename(input)
  return '<buffer>'
}

export class DumpCollection {
  private readonly dumps: readonly Dump[]
  public readonly report: Readonly<LoadReport>

  private constructor(dumps: Dump[], report: LoadReport) {
    this.dumps = Object.freeze(dumps)
    this.report = Object.freeze(report)
  }

  /**
   * Decode every dump in `input` (a file path, bytes, or an open ByteSource).
   * The source is closed before this returns or throws.
   */
  static load(input: SourceInput, options: LoadOptions = {}): DumpCollection {
    const arrayFormulas = options.arrayFormulas
      ? extendArrayFormulas(options.arrayFormulas)
      : BUILTIN_ARRAY_FORMULAS
    const decodeOptions: DecodeOptions = { arrayFormulas, unsupportedArrays: options.unsupportedArrays ?? 'abort' }
    const name = describeSource(input)

    const source = openSource(input)
    try {
      const reader = new PacketReader(source)
      const dumps: Dump[] = []
      let failure: DumpDecodeError | null = null

      while (reader.remaining > 0) {
        const dumpOffset = reader.position
        try {
          dumps.push(decodeDump(reader, decodeOptions))
        } catch (e) {
          failure = new DumpDecodeError(dumps.length, dumpOffset, e)
          if (options.strict) {
            error(`[ppf] ${name}: dump ${dumps.length} at byte ${dumpOffset} failed in strict mode`, e)
            throw e
          }
          error(`[ppf] ${name}: reading stopped at ${reader.position}/${reader.size}`, failure)
          warn('[ppf] pass strict: true to raise decode failures instead')
          break
        }
        source.skip(Math.min(DUMP_SEPARATOR_BYTES, reader.remaining))
      }

      const report: LoadReport = {
        source: name,
        bytesConsumed: reader.position,
        totalBytes: reader.size,
        complete: failure === null && reader.remaining === 0,
        failure,
      }
      log(`[ppf] ${name}: ${dumps.length} dump(s), ${report.bytesConsumed}/${report.totalBytes} bytes`)
      return new DumpCollection(dumps, report)
    } finally {
      source.close()
    }
  }

  // -- Accessors --------------------------------------------------------------

  get count(): number {
    return this.dumps.length
  }

  get zoneCount(): number {
    return this.first('read the zone count').header.zoneCount
  }

  get arrayNames(): readonly string[] {
    return this.first('list array names').header.arrayNames
  }

  get regionMask(): readonly number[] {
    return this.first('read region ids').regionIds
  }

  dump(index: number): Dump {
    if (this.dumps.length === 0) throw new EmptyCollectionError('read a dump')
    if (!Number.isInteger(index) || index < 0 || index >= this.dumps.length) {
      throw new RangeError(`Dump index ${index} out of range [0, ${this.dumps.length - 1}]`)
    }
    return this.dumps[index]
  }

  [Symbol.iterator](): Iterator<Dump> {
    return this.dumps[Symbol.iterator]()
  }

  // -- Queries ------------------------------------------------------------------

  /**
   * Check every dump's region ids against its region count. Returns each
   * distinct problem once, however many dumps share it.
   */
  validate(): string[] {
    const problems = new Set<string>()
    for (const dump of this.dumps) {
      if (new Set(dump.regionIds).size !== dump.header.regionCount) {
        problems.add(REGION_MISMATCH_MESSAGE)
      }
    }
    for (const p of problems) warn(`[ppf] ${p}`)
    return Array.from(problems)
  }

  times(): number[] {
    return this.dumps.map(d => d.header.time)
  }

  /** Index of the dump closest in time to `t`; the earlier dump wins a tie. */
  nearestIndex(t: number): number {
    if (this.dumps.length === 0) throw new EmptyCollectionError('find the nearest dump')
    let best = 0
    let bestDiff = Math.abs(this.dumps[0].header.time - t)
    for (let i = 1; i < this.dumps.length; i++) {
      const diff = Math.abs(this.dumps[i].header.time - t)
      if (diff < bestDiff) {
        best = i
        bestDiff = diff
      }
    }
    return best
  }

  /**
   * Gather one named array across all dumps as grid[element][dumpIndex].
   *
   * @example
   * const pres = dumps.collect('PRES')
   * pres.map(row => row[10]) // pressure in every zone at the 11th dump
   */
  collect(arrayName: string): number[][] {
    const columns = this.dumps.map((dump, i) => {
      const values = dump.arrays.get(arrayName)
      if (!values) throw new ArrayNotFoundError(arrayName, i)
      return values
    })
    if (columns.length === 0) return []

    const rows = columns[0].length
    const grid: number[][] = []
    for (let z = 0; z < rows; z++) {
      grid.push(columns.map(col => col[z]))
    }
    return grid
  }

  materialTable(): MaterialTable {
    return this.first('read the material table').materials
  }

  summary(): CollectionSummary {
    if (this.dumps.length === 0) {
      return {
        dumpCount: 0,
        zoneCount: null,
        regionCount: null,
        groupCount: null,
        arrayNames: [],
        firstTime: null,
        lastTime: null,
        firstCycle: null,
        lastCycle: null,
      }
    }
    const first = this.dumps[0].header
    const last = this.dumps[this.dumps.length - 1].header
    return {
      dumpCount: this.dumps.length,
      zoneCount: first.zoneCount,
      regionCount: first.regionCount,
      groupCount: first.groupCount,
      arrayNames: first.arrayNames,
      firstTime: first.time,
      lastTime: last.time,
      firstCycle: first.cycle,
      lastCycle: last.cycle,
    }
  }

  private first(operation: string): Dump {
    if (this.dumps.length === 0) throw new EmptyCollectionError(operation)
    return this.dumps[0]
  }
}
