export { Rational } from './domain/time/Rational.ts'
export * from './domain/time/instant.ts'
export * from './domain/errors.ts'
export * from './domain/types/TimeSeries.ts'
export * from './domain/types/segment.ts'

export type {
  DecodeOptions,
  DecodeWarning,
  FormatDecoder,
  FormatProbe,
  PayloadResult,
  SourceFile,
  TruncationPolicy,
} from './domain/formats/types.ts'
export { getDecoder, listDecoders, resolveFormat } from './domain/formats/FormatRegistry.ts'

export { encodeAsciiFile, type AsciiChannelInput, type AsciiFileInput } from './domain/formats/ascii/AsciiWriter.ts'
export { encodeAtsFile, type AtsFileInput } from './domain/formats/ats/AtsWriter.ts'
export { encodeB423File, type B423FileInput, type LemiStamp } from './domain/formats/lemi/LemiWriter.ts'
export { encodeMseedRecords, type MseedInput } from './domain/formats/miniseed/MseedWriter.ts'
export { SeedEncoding } from './domain/formats/miniseed/MseedDecoder.ts'
export { encodePhoenixTable } from './domain/formats/phoenix/PhoenixTable.ts'
export { encodePhoenixTs, type PhoenixRecordInput, type PhoenixTsInput } from './domain/formats/phoenix/PhoenixWriter.ts'
export { encodeSpamRaw, encodeXtr, type SpamRawInput, type XtrInput } from './domain/formats/spam/SpamWriter.ts'

export {
  reconcile,
  type OverlapPolicy,
  type RateChangePolicy,
  type ReconcileOptions,
} from './domain/engine/ContinuityReconciler.ts'
export {
  assemble,
  assembleSegments,
  ratesCompatible,
  type AssembleOptions,
  type BuildOptions,
  type NoOverlapPolicy,
} from './domain/engine/ChannelAssembler.ts'
export { Dataset } from './domain/engine/Dataset.ts'

export {
  decodeFile,
  loadSource,
  probeFile,
  type DecodedFile,
  type DecodeFileOptions,
  type LoadOptions,
} from './loader/FileLoader.ts'
export {
  buildDataset,
  decodeBatch,
  readDataset,
  type BatchOptions,
  type BatchProgress,
  type BatchResult,
  type FileFailure,
  type ReadDatasetOptions,
  type ReadDatasetResult,
} from './loader/BatchDecoder.ts'
export { SegmentCache, type FileStamp } from './loader/SegmentCache.ts'

export { IngestStore, type IngestStatus } from './stores/IngestStore.ts'
export { RootStore } from './stores/RootStore.ts'
export {
  parseSettings,
  readerSettingsSchema,
  SettingsStore,
  type ReaderSettings,
  type ReaderSettingsInput,
} from './stores/SettingsStore.ts'
