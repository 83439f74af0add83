// 文件存储接口
export interface FileStore {
  name: string

  // 读取文件，不存在时返回 null
  read(path: string): Promise<string | null>

  // 创建父目录
  ensureDirectory(path: string): Promise<void>

  // 原子写入：临时文件 + 重命名
  write(path: string, content: string): Promise<void>
}
