import type { BookmarkFormat, ParseContext } from './interface'
import type { BookmarkList, DecodeWarning, ParseResult } from '../types'
import { canonicalizeLocation } from '../location'
import { buildBookmarkList, type BookmarkEntry } from '../list'

// GTK 书签格式（纯文本）
// 每行：<位置> [名称]，# 开头为注释

export const gtkFormat: BookmarkFormat = {
  id: 'gtk',
  name: 'GTK bookmarks',
  aliases: ['plain-text'],
  path: ['.config', 'gtk-3.0', 'bookmarks'],
  parse: parseGtkBookmarks,
  serialize: serializeToGtkBookmarks,
}

function parseGtkBookmarks(content: string, context: ParseContext): ParseResult {
  const entries: BookmarkEntry[] = []
  const warnings: DecodeWarning[] = []
  const lines = content.split('\n')

  for (let i = 0; i < lines.length; i++) {
    const trimmed = lines[i].trim()
    if (!trimmed || trimmed.startsWith('#')) continue

    // 第一段空白之前是位置，其余为名称
    const match = /^(\S+)(?:\s+(.*))?$/s.exec(trimmed)
    const raw = match ? match[1] : trimmed
    const result = canonicalizeLocation(raw, context.baseDirectory)
    if (!result.success) {
      warnings.push({
        kind: 'malformedLocation',
        line: i + 1,
        raw: trimmed,
        message: `第 ${i + 1} 行: ${result.error.message}`,
      })
      continue
    }

    entries.push({ location: result.location, label: match?.[2], line: i + 1 })
  }

  const list = buildBookmarkList(entries)
  return { success: true, bookmarks: list.bookmarks, warnings: [...warnings, ...list.warnings] }
}

function serializeToGtkBookmarks(bookmarks: BookmarkList): string {
  return bookmarks
    .map((bookmark) => (bookmark.label ? `${bookmark.location} ${bookmark.label}\n` : `${bookmark.location}\n`))
    .join('')
}

export default gtkFormat
