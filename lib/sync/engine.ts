import { dirname, join } from 'node:path'
import type { BookmarkList, DecodeWarning, FormatId, SyncResult, TargetResult } from '../bookmark/types'
import type { FileStore } from '../storage/interface'
import { formats, formatIds } from '../bookmark/formats'
import { calculateDiff, countChanges } from '../bookmark/diff'
import { LocalFileStore } from '../storage/local'
import { SyncError, classifyFsError } from '../errors'

// 同步选项
export interface SyncOptions {
  baseDirectory: string
  dryRun?: boolean
  verbose?: boolean
  store?: FileStore
}

// 同步引擎：从一个源格式单向投影到其余两个格式
// 不对并发运行加锁，同一基准目录上的并发调用由调用方负责避免
export class SyncEngine {
  private store: FileStore
  private options: SyncOptions

  constructor(options: SyncOptions) {
    this.store = options.store ?? new LocalFileStore()
    this.options = options
  }

  // 格式文件的绝对路径
  resolvePath(id: FormatId): string {
    return join(this.options.baseDirectory, ...formats[id].path)
  }

  async sync(source: FormatId): Promise<SyncResult> {
    const sourcePath = this.resolvePath(source)
    this.log('开始同步，源:', source, sourcePath)

    let content: string | null
    try {
      content = await this.store.read(sourcePath)
    } catch (err) {
      return this.fail(source, classifyFsError(err, sourcePath, true))
    }
    if (content === null) {
      return this.fail(source, new SyncError('sourceMissing', `源书签文件不存在: ${sourcePath}`))
    }

    const parsed = formats[source].parse(content, { baseDirectory: this.options.baseDirectory })
    if (!parsed.success) {
      return this.fail(source, parsed.error)
    }

    const warnings: DecodeWarning[] = [...parsed.warnings]
    for (const warning of warnings) {
      console.warn(`[Sync] ${source}: ${warning.message}`)
    }
    this.log('解析完成，书签数:', parsed.bookmarks.length)

    const targets: TargetResult[] = []
    for (const id of formatIds) {
      if (id === source) continue
      targets.push(await this.syncTarget(id, parsed.bookmarks))
    }

    const failed = targets.filter((target) => target.status === 'failed')
    if (failed.length > 0) {
      const names = failed.map((target) => target.format).join(', ')
      console.error('[Sync] 部分目标写入失败:', names)
      return {
        success: false,
        source,
        error: `目标写入失败: ${names}`,
        errorType: 'filesystem',
        warnings,
        targets,
      }
    }

    const changes = targets.reduce(
      (sum, target) => sum + (target.status === 'failed' ? 0 : countChanges(target.diff)),
      0
    )
    this.log('同步完成，变更数:', changes)
    return { success: true, source, changes, warnings, targets }
  }

  // 生成并写入单个目标，失败只影响该目标
  private async syncTarget(id: FormatId, bookmarks: BookmarkList): Promise<TargetResult> {
    const format = formats[id]
    const path = this.resolvePath(id)

    try {
      const previous = await this.store.read(path)
      let previousBookmarks: BookmarkList = []
      let previousError: string | undefined
      if (previous !== null) {
        const parsed = format.parse(previous, { baseDirectory: this.options.baseDirectory })
        if (parsed.success) {
          previousBookmarks = parsed.bookmarks
        } else {
          previousError = parsed.error.message
          console.warn(`[Sync] ${id}: 原有文件损坏，将整体重新生成:`, previousError)
        }
      }

      const output = format.serialize(bookmarks, previousError === undefined ? previous : null)
      const diff = calculateDiff(previousBookmarks, bookmarks)

      if (this.options.dryRun) {
        this.log(`${id}: 预演模式，跳过写入`)
        return { format: id, path, status: 'skipped', reason: 'dryRun', diff, previousError }
      }

      await this.store.ensureDirectory(dirname(path))
      await this.store.write(path, output)
      this.log(`${id}: 已写入`, path)
      return { format: id, path, status: 'written', diff, previousError }
    } catch (err) {
      const error = classifyFsError(err, path)
      console.error(`[Sync] ${id}: 写入失败:`, error.message)
      return { format: id, path, status: 'failed', errorType: error.type, error: error.message }
    }
  }

  private fail(source: FormatId, error: SyncError): SyncResult {
    console.error('[Sync] 同步失败:', error.message)
    return { success: false, source, error: error.message, errorType: error.type, warnings: [], targets: [] }
  }

  private log(...args: unknown[]): void {
    if (this.options.verbose) {
      console.log('[Sync]', ...args)
    }
  }
}

// 便捷入口
export async function sync(
  source: FormatId,
  baseDirectory: string,
  options: Omit<SyncOptions, 'baseDirectory'> = {}
): Promise<SyncResult> {
  return new SyncEngine({ ...options, baseDirectory }).sync(source)
}
