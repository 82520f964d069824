import { describe, it, expect, vi, afterEach } from 'vitest'
import { BufferSource } from './byte-source'
import { PacketReader } from './packet-reader'
import { decodeDump } from './dump-decoder'
import type { DecodeOptions } from './dump-decoder'
import { BUILTIN_ARRAY_FORMULAS, extendArrayFormulas, lookupArray } from './dump-layout'
import { MalformedHeaderError, MalformedStringError, StreamExhaustedError, UnsupportedArrayNameError } from './errors'
import { encodeDump, simpleDump } from './__fixtures__/ppf-builder'

function decode(buf: Buffer, options: DecodeOptions = {}) {
  const reader = new PacketReader(new BufferSource(buf))
  return { dump: decodeDump(reader, options), reader }
}

afterEach(() => {
  vi.restoreAllMocks()
})

// ============================================================================
// Layout
// ============================================================================

describe('decodeDump layout', () => {
  const fixture = simpleDump(2.5, {
    cycle: 40,
    name: 'shock tube',
    machine: 'cray',
    maxGroups: 3,
    materials: [
      [{ atomicFraction: 1, atomicNumber: 4, atomicWeight: 9.012 }],
      [
        { atomicFraction: 0.5, atomicNumber: 1, atomicWeight: 1.008 },
        { atomicFraction: 0.5, atomicNumber: 6, atomicWeight: 12.011 },
      ],
    ],
  })
  const bytes = encodeDump(fixture)
  const { dump, reader } = decode(bytes)

  it('consumes exactly one dump', () => {
    expect(reader.position).toBe(bytes.length)
  })

  it('reads the bounds block', () => {
    expect(dump.bounds).toEqual({
      maxPhotonGroups: 3,
      maxIonTypes: 3,
      maxAtomicLevels: 5,
      maxMaterialsPerRegion: 4,
      maxPostProcessorArrays: 6,
      maxTransportParticles: 0,
      maxTransportReactions: 0,
      maxRegions: 2,
      maxZones: 3,
    })
  })

  it('reads header strings with their padding trimmed', () => {
    expect(dump.header.name).toBe('shock tube')
    expect(dump.header.timeBuffer).toBe('12:00:00')
    expect(dump.header.dateBuffer).toBe('01/02/03')
    expect(dump.header.version1).toBe('PP.11')
    expect(dump.header.version2).toBe('rev7')
    expect(dump.header.machine).toBe('cray')
  })

  it('reads the header scalars', () => {
    expect(dump.header.time).toBe(2.5)
    expect(dump.header.cycle).toBe(40)
    expect(dump.header.alpha).toBe(1)
    expect(dump.header.regionCount).toBe(2)
    expect(dump.header.zoneCount).toBe(3)
    expect(dump.header.groupCount).toBe(3)
    expect(dump.header.arrayCount).toBe(4)
  })

  it('splits the array name block into exactly the declared names', () => {
    expect(dump.header.arrayNames).toEqual(['R', 'RCM', 'PRES', 'RHO'])
  })

  it('reads photon group boundaries and centers', () => {
    expect(dump.header.groupBoundaries).toEqual([0.5, 1.5, 2.5])
    expect(dump.header.groupCenters).toEqual([0.25, 1.25, 2.25])
  })

  it('reads region ids and per-region material composition', () => {
    expect(dump.regionIds).toEqual([1, 1, 2])
    expect(Array.from(dump.materials.keys())).toEqual([1, 2])
    expect(dump.materials.get(1)).toEqual([{ atomicFraction: 1, atomicNumber: 4, atomicWeight: 9.012 }])
    expect(dump.materials.get(2)).toEqual([
      { atomicFraction: 0.5, atomicNumber: 1, atomicWeight: 1.008 },
      { atomicFraction: 0.5, atomicNumber: 6, atomicWeight: 12.011 },
    ])
  })

  it('keeps the global block positional', () => {
    expect(dump.globals).toHaveLength(48)
    expect(dump.globals[0]).toBe(0)
    expect(dump.globals[47]).toBe(23.5)
  })

  it('sizes each named array from the zone count', () => {
    expect(dump.arrays.get('R')).toEqual([2.5, 3.5, 4.5, 5.5])
    expect(dump.arrays.get('RCM')).toEqual([2.5, 3.5, 4.5, 5.5, 6.5])
    expect(dump.arrays.get('PRES')).toEqual([2.5, 3.5, 4.5])
    expect(dump.arrays.get('RHO')).toEqual([2.5, 3.5, 4.5])
    expect(dump.skippedArrays).toEqual([])
  })

  it('matches every decoded array to its formula', () => {
    for (const [name, values] of dump.arrays) {
      const entry = lookupArray(name)
      expect(entry.kind).toBe('known')
      if (entry.kind === 'known') {
        expect(values).toHaveLength(dump.header.zoneCount + entry.formula.offset)
      }
    }
  })

  it('returns a frozen value', () => {
    expect(Object.isFrozen(dump)).toBe(true)
    expect(Object.isFrozen(dump.header)).toBe(true)
    expect(Object.isFrozen(dump.regionIds)).toBe(true)
  })

  it('decodes the same bytes to the same value twice', () => {
    expect(decode(bytes).dump).toEqual(dump)
  })
})

// ============================================================================
// Edge cases
// ============================================================================

describe('decodeDump edge cases', () => {
  it('handles a dump with no declared arrays', () => {
    const { dump } = decode(encodeDump(simpleDump(1, { arrayNames: [], maxArrays: 3 })))
    expect(dump.header.arrayNames).toEqual([])
    expect(dump.arrays.size).toBe(0)
  })

  it('handles a full name table with no padding slots', () => {
    const { dump } = decode(encodeDump(simpleDump(1, { arrayNames: ['TE', 'TI'], maxArrays: 2 })))
    expect(dump.header.arrayNames).toEqual(['TE', 'TI'])
    expect(dump.arrays.get('TI')).toEqual([1, 2, 3])
  })

  it('reads STRTOT, U and QTOT with their own offsets', () => {
    const { dump } = decode(encodeDump(simpleDump(0, { arrayNames: ['STRTOT', 'U', 'QTOT'] })))
    expect(dump.arrays.get('STRTOT')).toHaveLength(5)
    expect(dump.arrays.get('U')).toHaveLength(4)
    expect(dump.arrays.get('QTOT')).toHaveLength(3)
  })

  it('fails with StreamExhausted on a truncated dump', () => {
    const bytes = encodeDump(simpleDump(1))
    const reader = new PacketReader(new BufferSource(bytes.subarray(0, bytes.length - 8)))
    expect(() => decodeDump(reader)).toThrow(StreamExhaustedError)
  })

  it('rejects a declared array count above the header maximum', () => {
    const bytes = encodeDump(simpleDump(1, { arrayNames: ['PRES', 'RHO'], maxArrays: 2 }))
    // maxPostProcessorArrays is the fifth bounds integer, after the lead marker
    bytes.writeInt32LE(1, 4 * 5)
    expect(() => decode(bytes)).toThrow(MalformedHeaderError)
  })

  it('rejects a name block that does not split into the declared count', () => {
    const bytes = encodeDump(simpleDump(1, { arrayNames: ['PRES', 'RHO'] }))
    const block = bytes.indexOf('PRES    RHO     ')
    bytes.write('PRES RHO TE     ', block, 'utf8')
    expect(() => decode(bytes)).toThrow(/holds 3 name\(s\), header declares 2/)
  })
})

// ============================================================================
// Absolute offsets
// ============================================================================

describe('decodeDump at fixed byte offsets', () => {
  // One zone, one region, one group, one array (PRES). Every field is placed
  // by absolute offset; unwritten bytes (padding, blank strings) stay zero.
  function handLaidDump(): Buffer {
    const b = Buffer.alloc(680)
    b.writeUInt32LE(1, 4) // max photon groups
    b.writeUInt32LE(1, 20) // max post-processor arrays
    b.writeUInt32LE(1, 32) // max regions
    b.writeUInt32LE(1, 36) // max zones
    b.write('hand', 48, 'utf8')
    b.write('linux', 116, 'utf8')
    b.writeDoubleLE(7.25, 124)
    b.writeUInt32LE(123, 132) // cycle
    b.writeUInt32LE(9, 136) // alpha
    b.writeUInt32LE(1, 140) // NREG
    b.writeUInt32LE(1, 144) // NZONE
    b.writeUInt32LE(1, 148) // NGROUP
    b.writeUInt32LE(1, 172) // NPPARY
    b.write('PRES    ', 208, 'utf8')
    b.writeFloatLE(0.5, 216)
    b.writeFloatLE(0.25, 220)
    b.writeUInt32LE(1, 236) // IREG of zone 0
    b.writeUInt32LE(1, 244) // elements in region 1
    b.writeDoubleLE(1, 248)
    b.writeDoubleLE(6, 256)
    b.writeDoubleLE(12, 264)
    b.writeDoubleLE(1.5, 272) // first global
    b.writeDoubleLE(2.5, 648) // last global
    b.writeDoubleLE(3.75, 672) // PRES[0]
    return b
  }

  const { dump, reader } = decode(handLaidDump())

  it('ends exactly at the last array value', () => {
    expect(reader.position).toBe(680)
  })

  it('reads the header fields from their offsets', () => {
    expect(dump.bounds.maxZones).toBe(1)
    expect(dump.header).toMatchObject({
      name: 'hand',
      timeBuffer: '',
      machine: 'linux',
      time: 7.25,
      cycle: 123,
      alpha: 9,
      regionCount: 1,
      zoneCount: 1,
      groupCount: 1,
      arrayCount: 1,
    })
    expect(dump.header.arrayNames).toEqual(['PRES'])
    expect(dump.header.groupBoundaries).toEqual([0.5])
    expect(dump.header.groupCenters).toEqual([0.25])
  })

  it('reads materials, globals and arrays from their offsets', () => {
    expect(dump.regionIds).toEqual([1])
    expect(dump.materials.get(1)).toEqual([{ atomicFraction: 1, atomicNumber: 6, atomicWeight: 12 }])
    expect(dump.globals).toHaveLength(48)
    expect(dump.globals[0]).toBe(1.5)
    expect(dump.globals[47]).toBe(2.5)
    expect(dump.arrays.get('PRES')).toEqual([3.75])
  })

  it('fails the dump when the name field holds invalid UTF-8', () => {
    const bytes = handLaidDump()
    bytes[48] = 0xff
    bytes[49] = 0xfe
    expect(() => decode(bytes)).toThrow(MalformedStringError)
  })
})

// ============================================================================
// Unsupported arrays
// ============================================================================

describe('decodeDump unsupported arrays', () => {
  const fixture = simpleDump(1, { arrayNames: ['PRES', 'ZBAR'], arrays: { ZBAR: [] } })

  it('aborts the dump by default', () => {
    expect(() => decode(encodeDump(fixture))).toThrow(UnsupportedArrayNameError)
  })

  it('skips the array and reports it under the skip policy', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const { dump } = decode(encodeDump(fixture), { unsupportedArrays: 'skip' })
    expect(dump.skippedArrays).toEqual(['ZBAR'])
    expect(dump.arrays.has('ZBAR')).toBe(false)
    expect(dump.arrays.get('PRES')).toEqual([1, 2, 3])
    expect(warn).toHaveBeenCalledTimes(1)
    expect(String(warn.mock.calls[0][0])).toContain('no size formula for array "ZBAR"')
  })

  it('reads the array when an extra formula is supplied', () => {
    const withValues = simpleDump(1, { arrayNames: ['ZBAR', 'PRES'], arrays: { ZBAR: [9, 8, 7, 6] } })
    const { dump } = decode(encodeDump(withValues), { arrayFormulas: extendArrayFormulas({ ZBAR: 1 }) })
    expect(dump.arrays.get('ZBAR')).toEqual([9, 8, 7, 6])
    expect(dump.arrays.get('PRES')).toEqual([1, 2, 3])
  })
})

describe('array formula table', () => {
  it('tags unknown names as unsupported', () => {
    expect(lookupArray('ZBAR')).toEqual({ kind: 'unsupported', name: 'ZBAR' })
  })

  it('does not treat prototype keys as array names', () => {
    expect(lookupArray('constructor').kind).toBe('unsupported')
  })

  it('is frozen', () => {
    expect(Object.isFrozen(BUILTIN_ARRAY_FORMULAS)).toBe(true)
    expect(Object.isFrozen(BUILTIN_ARRAY_FORMULAS.RCM)).toBe(true)
  })

  it('refuses to redefine a built-in formula', () => {
    expect(() => extendArrayFormulas({ PRES: 3 })).toThrow(RangeError)
  })

  it('leaves the built-in table untouched when extended', () => {
    const extended = extendArrayFormulas({ ZBAR: 0 })
    expect(extended.ZBAR).toEqual({ offset: 0, range: '[?, nzone+0]' })
    expect(lookupArray('ZBAR').kind).toBe('unsupported')
  })
})
