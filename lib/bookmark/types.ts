import type { ErrorType, SyncError } from '../errors'
import type { DiffResult } from './diff'

// 书签：一个位置 + 一个显示名称
export interface Bookmark {
  location: string
  label: string
}

// 书签列表（有序，位置唯一）
export type BookmarkList = readonly Bookmark[]

// 支持的书签存储
export type FormatId = 'gtk' | 'kde' | 'qt'

// 解码警告（单条记录被跳过，不影响整体解码）
export interface DecodeWarning {
  kind: 'malformedLocation' | 'duplicateLocation'
  line?: number   // 纯文本格式的行号（从 1 开始）
  entry?: number  // XML/INI 格式的条目序号（从 1 开始）
  raw: string
  message: string
}

// 解码结果：条目级问题记为警告，文档级问题直接失败
export type ParseResult =
  | { success: true; bookmarks: BookmarkList; warnings: DecodeWarning[] }
  | { success: false; error: SyncError<'malformedDocument'> }

// 单个目标的同步结果
// previousError: 目标原有内容损坏、已被整体替换时的说明
export type TargetResult =
  | { format: FormatId; path: string; status: 'written'; diff: DiffResult; previousError?: string }
  | { format: FormatId; path: string; status: 'skipped'; reason: 'dryRun'; diff: DiffResult; previousError?: string }
  | { format: FormatId; path: string; status: 'failed'; errorType: ErrorType; error: string }

// 同步结果
export type SyncResult =
  | {
      success: true
      source: FormatId
      changes: number
      warnings: DecodeWarning[]
      targets: TargetResult[]
    }
  | {
      success: false
      source: FormatId
      error: string
      errorType: ErrorType
      warnings: DecodeWarning[]
      targets: TargetResult[]
    }
