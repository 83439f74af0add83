import type { BookmarkList, FormatId, ParseResult } from '../types'

// 解析上下文
export interface ParseContext {
  // 用于展开 ~ 的基准目录
  baseDirectory: string
}

// 书签格式接口（纯字符串转换，不涉及文件读写）
export interface BookmarkFormat {
  id: FormatId
  name: string
  aliases: readonly string[]
  // 相对基准目录的固定路径
  path: readonly string[]
  parse(content: string, context: ParseContext): ParseResult
  // previous: 目标文件原有内容，用于保留不属于本工具的数据
  serialize(bookmarks: BookmarkList, previous?: string | null): string
}
