import type { Bookmark, BookmarkList, DecodeWarning } from './types'
import { deriveLabel } from './location'

// 解码出的候选条目（位置已规范化）
export interface BookmarkEntry {
  location: string
  label?: string
  line?: number
  entry?: number
}

// 创建书签：名称为空时使用推导名称，换行（含 NEL 与 Unicode 行/段分隔符）折叠为空格
export function createBookmark(location: string, label = ''): Bookmark {
  const cleaned = label.replace(/\s*[\r\n\u0085\u2028\u2029]+\s*/g, ' ').trim()
  return { location, label: cleaned || deriveLabel(location) }
}

// 构建书签列表：位置重复时保留最后一次出现（及其位置），之前的记为警告
export function buildBookmarkList(entries: readonly BookmarkEntry[]): {
  bookmarks: BookmarkList
  warnings: DecodeWarning[]
} {
  const seen = new Set<string>()
  const kept: Bookmark[] = []
  const warnings: DecodeWarning[] = []

  // 倒序遍历，先遇到的即为最后一次出现
  for (let i = entries.length - 1; i >= 0; i--) {
    const entry = entries[i]
    if (seen.has(entry.location)) {
      warnings.push({
        kind: 'duplicateLocation',
        line: entry.line,
        entry: entry.entry,
        raw: entry.location,
        message: `重复的书签位置，保留后出现的条目: ${entry.location}`,
      })
      continue
    }
    seen.add(entry.location)
    kept.push(createBookmark(entry.location, entry.label))
  }

  return { bookmarks: kept.reverse(), warnings: warnings.reverse() }
}
