/**
 * Static layout tables for the dump record.
 *
 * Named arrays carry no length on the wire. Their element count is derived
 * from the zone count by a per-name formula; names outside the table cannot
 * be located in the stream.
 */

export interface ArrayFormula {
  /** Element count is zoneCount + offset. */
  offset: number
  /** Mesh index range the array spans, for display only. */
  range: string
}

export type ArrayLookup =
  | { kind: 'known'; name: string; formula: ArrayFormula }
  | { kind: 'unsupported'; name: string }

export type ArrayFormulaTable = Readonly<Record<string, Readonly<ArrayFormula>>>

function freezeTable(entries: Record<string, ArrayFormula>): ArrayFormulaTable {
  const out: Record<string, Readonly<ArrayFormula>> = {}
  for (const [name, formula] of Object.entries(entries)) out[name] = Object.freeze({ ...formula })
  return Object.freeze(out)
}

export const BUILTIN_ARRAY_FORMULAS: ArrayFormulaTable = freezeTable({
  R:      { offset: 1, range: '[1, nmesh+1]' },
  RCM:    { offset: 2, range: '[0, nmesh+1]' },
  U:      { offset: 1, range: '[1, nmesh+1]' },
  PRES:   { offset: 0, range: '[1, nzone]' },
  RHO:    { offset: 0, range: '[1, nzone]' },
  TE:     { offset: 0, range: '[1, nzone]' },
  TI:     { offset: 0, range: '[1, nzone]' },
  QTOT:   { offset: 0, range: '[1, nzone]' },
  STRTOT: { offset: 2, range: '[0, nzone+1]' },
})

/**
 * Build a new frozen table with `extra` entries added over the built-ins.
 * Built-in names keep their formula; redefining one is rejected.
 */
export function extendArrayFormulas(extra: Record<string, number>): ArrayFormulaTable {
  const merged: Record<string, ArrayFormula> = { ...BUILTIN_ARRAY_FORMULAS }
  for (const [name, offset] of Object.entries(extra)) {
    if (Object.prototype.hasOwnProperty.call(BUILTIN_ARRAY_FORMULAS, name)) {
      throw new RangeError(`Array "${name}" already has a built-in size formula`)
    }
    if (!Number.isInteger(offset) || offset < 0) {
      throw new RangeError(`Size offset for array "${name}" must be a non-negative integer, got ${offset}`)
    }
    merged[name] = { offset, range: `[?, nzone+${offset}]` }
  }
  return freezeTable(merged)
}

export function lookupArray(name: string, table: ArrayFormulaTable = BUILTIN_ARRAY_FORMULAS): ArrayLookup {
  if (!Object.prototype.hasOwnProperty.call(table, name)) return { kind: 'unsupported', name }
  return { kind: 'known', name, formula: table[name] }
}

export function arrayElementCount(formula: ArrayFormula, zoneCount: number): number {
  return zoneCount + formula.offset
}

// ---------------------------------------------------------------------------
// Positional padding, in packets. Purpose unknown unless noted; positions
// must be preserved exactly.
// ---------------------------------------------------------------------------

export const PADDING = Object.freeze({
  /** Record marker opening the bounds block. */
  boundsLead: 1,
  /** Record end marker + next record's marker. */
  boundsTrail: 2,
  afterDateBuffer: 1,
  afterGroupCount: 5,
  afterArrayCount: 8,
  materialLead: 3,
  afterRegionIds: 1,
  /** One double-pair ahead of the named-array block. */
  arraysLead: 2,
  /** One double-pair ahead of each named array. */
  perArray: 2,
})

/** Separator between consecutive dumps, in bytes. */
export const DUMP_SEPARATOR_BYTES = 4

export const NAME_PACKETS = 8
export const SHORT_STRING_PACKETS = 2
/** Packets per declared array name in the name block. */
export const ARRAY_NAME_PACKETS = 2
export const GLOBAL_BLOCK_PACKETS = 96
