export { SyncEngine, sync, type SyncOptions } from './engine'
export { SyncError, type ErrorType, getErrorI18nKey } from '../errors'
