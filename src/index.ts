/**
 * ppf-reader: decoder for the binary .ppf dump files written by a
 * radiation-hydrodynamics code's post-processor.
 */

export { DumpCollection, REGION_MISMATCH_MESSAGE } from './core/dump-collection'
export type { LoadOptions, LoadReport, CollectionSummary } from './core/dump-collection'
export { decodeDump } from './core/dump-decoder'
export type {
  Dump,
  DumpBounds,
  DumpHeader,
  MaterialElement,
  MaterialTable,
  DecodeOptions,
  UnsupportedArrayPolicy,
} from './core/dump-decoder'
export { PacketReader, PACKET_SIZE, ITEM_SIZE } from './core/packet-reader'
export type { PacketType, PacketValue } from './core/packet-reader'
export { BufferSource, FileSource, openSource } from './core/byte-source'
export type { ByteSource, SourceInput } from './core/byte-source'
export {
  BUILTIN_ARRAY_FORMULAS,
  extendArrayFormulas,
  lookupArray,
  arrayElementCount,
} from './core/dump-layout'
export type { ArrayFormula, ArrayFormulaTable, ArrayLookup } from './core/dump-layout'
export { parseConfig, loadConfigFile, applyConfig, ReaderConfigSchema } from './core/config'
export type { ReaderConfig, ReaderConfigInput } from './core/config'
export { initLogger, closeLogger, setLogLevel, getLogPath } from './core/logger'
export type { LogLevel } from './core/logger'
export * from './core/errors'
