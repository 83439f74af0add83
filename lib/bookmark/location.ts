import { posix } from 'node:path'
import { SyncError } from '../errors'

// 位置规范化结果
export type LocationResult =
  | { success: true; location: string }
  | { success: false; error: SyncError<'malformedLocation'> }

const FILE_PREFIX = 'file://'

// 带 scheme 的绝对 URI（sftp://、smb://、trash:/ 等）
const URI_PATTERN = /^[a-z][a-z0-9+.-]*:\//i

// GLib 在路径中保留不转义的保留字符
const PATH_ALLOWED = /%(3A|40|26|3D|2B|24|2C)/g

function malformed(raw: string, reason: string): LocationResult {
  return {
    success: false,
    error: new SyncError('malformedLocation', `书签位置无法解析 (${reason}): ${raw}`),
  }
}

// 按 GLib 规则转义单个路径段
function encodeSegment(segment: string): string {
  return encodeURIComponent(segment).replace(PATH_ALLOWED, (match) => decodeURIComponent(match))
}

// 解码失败时保留原文
function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value)
  } catch {
    return value
  }
}

// 绝对路径 -> file:// URI
function fileUriFromPath(raw: string, path: string): LocationResult {
  const normalized = posix.normalize(path)
  const trimmed = normalized.length > 1 && normalized.endsWith('/') ? normalized.slice(0, -1) : normalized

  try {
    return { success: true, location: FILE_PREFIX + trimmed.split('/').map(encodeSegment).join('/') }
  } catch {
    // 孤立的代理字符无法编码
    return malformed(raw, 'encoding')
  }
}

// 规范化书签位置：统一为 file:// 绝对形式（百分号转义）
export function canonicalizeLocation(raw: string, baseDirectory: string): LocationResult {
  const value = raw.trim()
  if (!value) {
    return malformed(raw, 'empty')
  }

  if (URI_PATTERN.test(value)) {
    let url: URL
    try {
      url = new URL(value)
    } catch {
      return malformed(raw, 'uri')
    }

    // 远程位置原样保留（仅做 URL 标准化）
    if (url.protocol !== 'file:') {
      return { success: true, location: url.href }
    }

    // file://localhost/ 的 host 已被 URL 解析器清空
    if (url.hostname !== '') {
      return malformed(raw, 'host')
    }
    if (url.search || url.hash) {
      return malformed(raw, 'query')
    }

    const segments: string[] = []
    for (const segment of url.pathname.split('/')) {
      let decoded: string
      try {
        decoded = decodeURIComponent(segment)
      } catch {
        return malformed(raw, 'escape')
      }
      if (decoded.includes('/') || decoded.includes('\0')) {
        return malformed(raw, 'segment')
      }
      segments.push(decoded)
    }
    return fileUriFromPath(raw, segments.join('/'))
  }

  // 普通路径
  let path = value.replace(/\\/g, '/')
  if (path === '~' || path.startsWith('~/')) {
    path = baseDirectory.replace(/\\/g, '/') + path.slice(1)
  }
  if (!path.startsWith('/')) {
    return malformed(raw, 'relative')
  }
  if (path.includes('\0')) {
    return malformed(raw, 'segment')
  }
  return fileUriFromPath(raw, path)
}

// 从位置推导显示名称：最后一个路径段（已解码）
export function deriveLabel(location: string): string {
  let url: URL
  try {
    url = new URL(location)
  } catch {
    return location
  }

  const segments = url.pathname.split('/').filter(Boolean)
  const last = segments[segments.length - 1]
  if (last) {
    return safeDecode(last)
  }
  return url.hostname || location
}

// 是否为本地文件位置
export function isLocalLocation(location: string): boolean {
  return location.startsWith(FILE_PREFIX)
}
