import { randomBytes } from 'node:crypto'
import { chmod, lstat, mkdir, open, readFile, realpath, rename, rm, stat, type FileHandle } from 'node:fs/promises'
import { basename, dirname, join } from 'node:path'
import type { FileStore } from './interface'
import { classifyFsError, isErrnoException } from '../errors'

const DEFAULT_MODE = 0o644

export class LocalFileStore implements FileStore {
  name = 'local'

  async read(path: string): Promise<string | null> {
    try {
      return await readFile(path, 'utf8')
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return null
      throw classifyFsError(err, path)
    }
  }

  async ensureDirectory(path: string): Promise<void> {
    try {
      await mkdir(path, { recursive: true })
    } catch (err) {
      console.error('[FileStore] 创建目录失败:', path, err)
      throw classifyFsError(err, path)
    }
  }

  async write(path: string, content: string): Promise<void> {
    const target = await this.resolveTarget(path)
    const mode = await this.existingMode(target)
    const temp = join(dirname(target), `.${basename(target)}.${process.pid}.${randomBytes(6).toString('hex')}.tmp`)

    let handle: FileHandle | null = null
    let renamed = false
    try {
      handle = await open(temp, 'wx', mode ?? DEFAULT_MODE)
      await handle.writeFile(content, 'utf8')
      await handle.sync()
      await handle.close()
      handle = null

      // open 的 mode 受 umask 影响，沿用原文件权限
      if (mode !== undefined) {
        await chmod(temp, mode)
      }
      await rename(temp, target)
      renamed = true
    } catch (err) {
      console.error('[FileStore] 写入失败:', target, err)
      throw classifyFsError(err, target)
    } finally {
      if (handle) {
        await handle.close().catch((err: unknown) => console.warn('[FileStore] 关闭临时文件失败:', temp, err))
      }
      if (!renamed) {
        await rm(temp, { force: true }).catch((err: unknown) => console.warn('[FileStore] 清理临时文件失败:', temp, err))
      }
    }
  }

  // 目标是符号链接时写入链接指向的文件
  private async resolveTarget(path: string): Promise<string> {
    try {
      const info = await lstat(path)
      if (!info.isSymbolicLink()) return path
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return path
      throw classifyFsError(err, path)
    }

    try {
      return await realpath(path)
    } catch (err) {
      // 悬空链接：直接替换链接本身
      console.warn('[FileStore] 符号链接无法解析，将替换链接:', path, err)
      return path
    }
  }

  private async existingMode(path: string): Promise<number | undefined> {
    try {
      return (await stat(path)).mode & 0o7777
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return undefined
      throw classifyFsError(err, path)
    }
  }
}
