export type { BookmarkFormat, ParseContext } from './interface'
export { gtkFormat } from './gtk'
export { xbelFormat } from './xbel'
export { qtFormat } from './qt'

import { gtkFormat } from './gtk'
import { xbelFormat } from './xbel'
import { qtFormat } from './qt'
import type { BookmarkFormat } from './interface'
import type { FormatId } from '../types'

// 所有支持的格式（顺序即目标写入顺序）
export const formats: Record<FormatId, BookmarkFormat> = {
  gtk: gtkFormat,
  kde: xbelFormat,
  qt: qtFormat,
}

export const formatIds: readonly FormatId[] = ['gtk', 'kde', 'qt']

// 根据名称或别名获取格式（不区分大小写）
export function getFormatByName(name: string): BookmarkFormat | null {
  const normalized = name.trim().toLowerCase()
  for (const id of formatIds) {
    const format = formats[id]
    if (format.id === normalized || format.aliases.includes(normalized)) return format
  }
  return null
}
