export { invalidJoinInputError, JoinError, JoinErrorCode, mergeConflictError } from './errors'

export { deepMerge, flattenIndex, joinArrayData } from './joiner'
