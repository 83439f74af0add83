import { parse as parseIni, stringify as stringifyIni } from 'ini'
import type { BookmarkFormat, ParseContext } from './interface'
import type { BookmarkList, DecodeWarning, ParseResult } from '../types'
import { SyncError } from '../../errors'
import { canonicalizeLocation } from '../location'
import { buildBookmarkList, type BookmarkEntry } from '../list'

// Qt 文件对话框配置（INI）
// [FileDialog] 分组下使用 QSettings 数组语法：
//   shortcuts\size=N, shortcuts\1 … shortcuts\N
//   labels\size=M,    labels\1 … labels\M（可选，缺失时使用推导名称）

export const qtFormat: BookmarkFormat = {
  id: 'qt',
  name: 'Qt file dialog',
  aliases: ['ini-style'],
  path: ['.config', 'QtProject.conf'],
  parse: parseQtConfig,
  serialize: serializeToQtConfig,
}

const GROUP = 'FileDialog'
const SHORTCUTS = 'shortcuts'
const LABELS = 'labels'

// 本工具管理的键
const OWNED_KEY = /^(shortcuts|labels)(\\|$)/

type IniSection = Record<string, unknown>

function isSection(value: unknown): value is IniSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

// ini 会把 true/false/null 转换为非字符串值
function readValue(section: IniSection, key: string): string | undefined {
  const value = section[key]
  if (value === undefined || isSection(value)) return undefined
  return String(value)
}

function malformed(message: string): ParseResult {
  return { success: false, error: new SyncError('malformedDocument', `Qt 配置无法解析: ${message}`) }
}

// 读取数组（数量与下标必须一致）
function readArray(section: IniSection, name: string): string[] | string {
  const prefix = `${name}\\`
  const indexed = Object.keys(section).filter((key) => key.startsWith(prefix) && key !== `${prefix}size`)
  const size = readValue(section, `${prefix}size`)

  if (size === undefined) {
    return indexed.length > 0 ? `${name} 缺少 ${prefix}size` : []
  }
  if (!/^\d+$/.test(size.trim())) {
    return `${prefix}size 不是有效数字: ${size}`
  }

  const count = Number(size.trim())
  const values: string[] = []
  for (let i = 1; i <= count; i++) {
    const value = readValue(section, `${prefix}${i}`)
    if (value === undefined) {
      return `${prefix}size=${count}，但缺少 ${prefix}${i}`
    }
    values.push(value)
  }

  const extra = indexed.find((key) => {
    const index = key.slice(prefix.length)
    return !/^\d+$/.test(index) || Number(index) < 1 || Number(index) > count
  })
  if (extra) {
    return `${prefix}size=${count}，但存在多余的键 ${extra}`
  }
  return values
}

// Qt 自身写入的单键形式：shortcuts=url1, url2
function readLegacyList(section: IniSection): string[] {
  const value = readValue(section, SHORTCUTS)?.trim()
  if (!value || value === '@Invalid()') return []
  return value
    .split(/,\s*/)
    .map((item) => item.trim())
    .filter(Boolean)
}

function parseQtConfig(content: string, context: ParseContext): ParseResult {
  const config = parseIni(content)
  const section: unknown = config[GROUP]
  if (!isSection(section)) {
    return { success: true, bookmarks: [], warnings: [] }
  }

  let locations: string[]
  let labels: string[] = []
  if (readValue(section, `${SHORTCUTS}\\size`) === undefined && readValue(section, SHORTCUTS) !== undefined) {
    locations = readLegacyList(section)
  } else {
    const shortcuts = readArray(section, SHORTCUTS)
    if (typeof shortcuts === 'string') return malformed(shortcuts)
    locations = shortcuts

    const labelList = readArray(section, LABELS)
    if (typeof labelList === 'string') return malformed(labelList)
    labels = labelList
  }

  const entries: BookmarkEntry[] = []
  const warnings: DecodeWarning[] = []
  locations.forEach((raw, index) => {
    const result = canonicalizeLocation(raw, context.baseDirectory)
    if (!result.success) {
      warnings.push({
        kind: 'malformedLocation',
        entry: index + 1,
        raw,
        message: `第 ${index + 1} 个快捷方式: ${result.error.message}`,
      })
      return
    }
    entries.push({ location: result.location, label: labels[index], entry: index + 1 })
  })

  const list = buildBookmarkList(entries)
  return { success: true, bookmarks: list.bookmarks, warnings: [...warnings, ...list.warnings] }
}

// ini 写出时只转义 ; 和 #，读取时反斜杠是转义符，需成对写出
// ini 会整体加 JSON 引号的值（含 =、换行、首尾空白或被引号包围）读回时原样还原，保持不变
function escapeValue(value: string): string {
  const quotedByIni =
    /[=\r\n]/.test(value) ||
    value.startsWith('[') ||
    value !== value.trim() ||
    (value.length > 1 &&
      ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))))
  return quotedByIni ? value : value.replace(/\\/g, '\\\\')
}

function serializeToQtConfig(bookmarks: BookmarkList, previous?: string | null): string {
  const config: Record<string, unknown> = previous ? parseIni(previous) : {}
  const existing: unknown = config[GROUP]

  // 保留分组中其他键的原有顺序
  const section: IniSection = {}
  if (isSection(existing)) {
    for (const [key, value] of Object.entries(existing)) {
      if (!OWNED_KEY.test(key)) section[key] = typeof value === 'string' ? escapeValue(value) : value
    }
  }

  section[`${SHORTCUTS}\\size`] = String(bookmarks.length)
  bookmarks.forEach((bookmark, index) => {
    section[`${SHORTCUTS}\\${index + 1}`] = escapeValue(bookmark.location)
  })
  section[`${LABELS}\\size`] = String(bookmarks.length)
  bookmarks.forEach((bookmark, index) => {
    section[`${LABELS}\\${index + 1}`] = escapeValue(bookmark.label)
  })

  config[GROUP] = section
  return stringifyIni(config)
}

export default qtFormat
