import { XMLParser, XMLValidator } from 'fast-xml-parser'
import type { BookmarkFormat, ParseContext } from './interface'
import type { BookmarkList, DecodeWarning, ParseResult } from '../types'
import { SyncError } from '../../errors'
import { canonicalizeLocation, isLocalLocation } from '../location'
import { buildBookmarkList, type BookmarkEntry } from '../list'

// KDE 位置面板格式（XBEL）
//
// 输出结构固定，未变化的输入重复生成时逐字节一致：
//   <?xml version="1.0" encoding="UTF-8"?>
//   <!DOCTYPE xbel>
//   <xbel xmlns:bookmark=… xmlns:kdepriv=… xmlns:mime=…>
//    <bookmark href="…">               系统位置在前（保持原顺序），用户书签在后
//     <title>…</title>
//     <info>
//      <metadata owner="http://freedesktop.org">
//       <bookmark:icon name="…"/>
//      </metadata>
//      <metadata owner="http://www.kde.org">   仅系统位置
//       <isSystemItem>true</isSystemItem>
//      </metadata>
//     </info>
//    </bookmark>
//   </xbel>
// 没有任何条目时根元素自闭合。

export const xbelFormat: BookmarkFormat = {
  id: 'kde',
  name: 'KDE places',
  aliases: ['xml-list'],
  path: ['.local', 'share', 'user-places.xbel'],
  parse: parseXbel,
  serialize: serializeToXbel,
}

const NAMESPACES = [
  'xmlns:bookmark="http://www.freedesktop.org/standards/desktop-bookmarks"',
  'xmlns:kdepriv="http://www.kde.org/kdepriv"',
  'xmlns:mime="http://www.freedesktop.org/standards/shared-mime-info"',
].join(' ')

const FREEDESKTOP_OWNER = 'http://freedesktop.org'
const KDE_OWNER = 'http://www.kde.org'

// 始终解析为数组的路径
const ARRAY_PATHS = new Set([
  'xbel.bookmark',
  'xbel.bookmark.title',
  'xbel.bookmark.info',
  'xbel.bookmark.info.metadata',
])

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: false,
  trimValues: true,
  // 解码 &#233; / &#xE9; 等数字字符引用
  htmlEntities: true,
  isArray: (_tagName, jPath) => ARRAY_PATHS.has(jPath),
})

type XmlNode = Record<string, unknown>

// KDE 内置位置（主目录、回收站等），不属于用户书签，写入时原样保留
interface SystemPlace {
  href: string
  title: string
  icon?: string
}

type XbelDocument =
  | { success: true; items: unknown[] }
  | { success: false; error: SyncError<'malformedDocument'> }

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function asArray(value: unknown): unknown[] {
  if (value === undefined || value === null) return []
  return Array.isArray(value) ? value : [value]
}

// 读取元素文本（带属性的元素文本在 #text 中）
function readText(value: unknown): string {
  if (typeof value === 'string') return value
  if (isNode(value) && typeof value['#text'] === 'string') return value['#text']
  return ''
}

function readAttribute(node: unknown, name: string): string | undefined {
  if (!isNode(node)) return undefined
  const value = node[`@_${name}`]
  return typeof value === 'string' ? value : undefined
}

function metadataOf(item: unknown): XmlNode[] {
  if (!isNode(item)) return []
  return asArray(item.info)
    .flatMap((info) => (isNode(info) ? asArray(info.metadata) : []))
    .filter(isNode)
}

function isSystemItem(item: unknown): boolean {
  return metadataOf(item).some((metadata) =>
    asArray(metadata.isSystemItem).some((flag) => readText(flag) === 'true')
  )
}

function readIcon(item: unknown): string | undefined {
  for (const metadata of metadataOf(item)) {
    for (const icon of asArray(metadata['bookmark:icon'])) {
      const name = readAttribute(icon, 'name')
      if (name) return name
    }
  }
  return undefined
}

function readTitle(item: unknown): string {
  if (!isNode(item)) return ''
  return readText(asArray(item.title)[0])
}

// 校验并解析 XBEL 文档，返回所有 <bookmark> 元素
function readXbelDocument(content: string): XbelDocument {
  const validation = XMLValidator.validate(content)
  if (validation !== true) {
    const { msg, line, col } = validation.err
    return {
      success: false,
      error: new SyncError('malformedDocument', `XBEL 文档无法解析 (${line}:${col}): ${msg}`),
    }
  }

  const parsed: unknown = parser.parse(content)
  if (!isNode(parsed) || !('xbel' in parsed)) {
    return {
      success: false,
      error: new SyncError('malformedDocument', 'XBEL 文档的根元素必须是 <xbel>'),
    }
  }

  const root = parsed.xbel
  return { success: true, items: isNode(root) ? asArray(root.bookmark) : [] }
}

function parseXbel(content: string, context: ParseContext): ParseResult {
  const document = readXbelDocument(content)
  if (!document.success) {
    return document
  }

  const entries: BookmarkEntry[] = []
  const warnings: DecodeWarning[] = []

  document.items.forEach((item, index) => {
    if (isSystemItem(item)) return

    const href = readAttribute(item, 'href') ?? ''
    const result = canonicalizeLocation(href, context.baseDirectory)
    if (!result.success) {
      warnings.push({
        kind: 'malformedLocation',
        entry: index + 1,
        raw: href,
        message: `第 ${index + 1} 个书签: ${result.error.message}`,
      })
      return
    }

    entries.push({ location: result.location, label: readTitle(item), entry: index + 1 })
  })

  const list = buildBookmarkList(entries)
  return { success: true, bookmarks: list.bookmarks, warnings: [...warnings, ...list.warnings] }
}

// 从原有文档中收集系统位置
function collectSystemPlaces(previous: string): SystemPlace[] {
  const document = readXbelDocument(previous)
  if (!document.success) return []

  const places: SystemPlace[] = []
  for (const item of document.items) {
    const href = readAttribute(item, 'href')
    if (!href || !isSystemItem(item)) continue
    places.push({ href, title: readTitle(item), icon: readIcon(item) })
  }
  return places
}

// 编码 XML 实体
function encodeXmlEntities(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
}

function serializeBookmark(lines: string[], href: string, title: string, icon: string | undefined, system: boolean): void {
  lines.push(` <bookmark href="${encodeXmlEntities(href)}">`)
  lines.push(`  <title>${encodeXmlEntities(title)}</title>`)
  lines.push('  <info>')
  if (icon) {
    lines.push(`   <metadata owner="${FREEDESKTOP_OWNER}">`)
    lines.push(`    <bookmark:icon name="${encodeXmlEntities(icon)}"/>`)
    lines.push('   </metadata>')
  }
  if (system) {
    lines.push(`   <metadata owner="${KDE_OWNER}">`)
    lines.push('    <isSystemItem>true</isSystemItem>')
    lines.push('   </metadata>')
  }
  lines.push('  </info>')
  lines.push(' </bookmark>')
}

function serializeToXbel(bookmarks: BookmarkList, previous?: string | null): string {
  const systemPlaces = previous ? collectSystemPlaces(previous) : []
  const lines: string[] = ['<?xml version="1.0" encoding="UTF-8"?>', '<!DOCTYPE xbel>']

  if (systemPlaces.length === 0 && bookmarks.length === 0) {
    lines.push(`<xbel ${NAMESPACES}/>`)
    return lines.join('\n') + '\n'
  }

  lines.push(`<xbel ${NAMESPACES}>`)
  for (const place of systemPlaces) {
    serializeBookmark(lines, place.href, place.title, place.icon, true)
  }
  for (const bookmark of bookmarks) {
    const icon = isLocalLocation(bookmark.location) ? 'folder' : 'folder-remote'
    serializeBookmark(lines, bookmark.location, bookmark.label, icon, false)
  }
  lines.push('</xbel>')
  return lines.join('\n') + '\n'
}

export default xbelFormat
