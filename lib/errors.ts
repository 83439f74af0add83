/**
 * 统一错误处理模块
 * 定义错误类型和错误分类函数
 */

// 错误类型
export type ErrorType =
  | 'sourceMissing'     // 源文件不存在
  | 'malformedDocument' // 文档结构损坏
  | 'malformedLocation' // 单条书签位置无法解析
  | 'filesystem'        // 目录创建/读写/重命名失败
  | 'unknownFormat'     // 未知的书签格式
  | 'unknown'           // 未知错误

// 同步错误类
export class SyncError<T extends ErrorType = ErrorType> extends Error {
  type: T

  constructor(type: T, message?: string) {
    super(message || getDefaultMessage(type))
    this.type = type
    this.name = 'SyncError'
  }
}

// 获取默认错误消息（用于日志，CLI 输出使用 i18n）
function getDefaultMessage(type: ErrorType): string {
  const messages: Record<ErrorType, string> = {
    sourceMissing: '源书签文件不存在',
    malformedDocument: '书签文件结构损坏',
    malformedLocation: '书签位置无法解析',
    filesystem: '文件系统操作失败',
    unknownFormat: '未知的书签格式',
    unknown: '未知错误',
  }
  return messages[type]
}

// Node 的 errno 错误：按 code 判断，不依赖 Error 原型
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string'
}

// 根据文件系统错误分类
// reading 为 true 时，ENOENT 视为源文件缺失
export function classifyFsError(err: unknown, path: string, reading = false): SyncError {
  if (err instanceof SyncError) {
    return err
  }

  if (isErrnoException(err)) {
    if (reading && err.code === 'ENOENT') {
      return new SyncError('sourceMissing', `${getDefaultMessage('sourceMissing')}: ${path}`)
    }
    return new SyncError('filesystem', `${err.code} ${path}: ${err.message}`)
  }

  if (err instanceof Error) {
    return new SyncError('filesystem', `${path}: ${err.message}`)
  }

  return new SyncError('unknown', String(err))
}

// 获取错误的 i18n key
export function getErrorI18nKey(type: ErrorType): string {
  return `error.${type}`
}
