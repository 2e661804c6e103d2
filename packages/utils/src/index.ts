export { createLogger, logger, LogLevels, setLogLevel } from './logger'

export {
  compareByField,
  compareStrings,
  isRecord,
  isRecordList,
  toKey,
  uniqueBy,
} from './record'

export type { DataRecord, FieldValue, Scalar, SiteData } from './record'
