import type { BookmarkList } from './types'

// 差异类型
export type DiffType = 'added' | 'removed' | 'modified'

// 单个差异项
export interface DiffItem {
  type: DiffType
  location: string
  label: string
  oldLabel?: string  // 仅 modified 时有值（名称变更）
}

// 差异结果
export interface DiffResult {
  added: DiffItem[]
  removed: DiffItem[]
  modified: DiffItem[]
  reordered: boolean  // 共同条目的相对顺序是否变化
  hasChanges: boolean
}

// 计算两个书签列表的差异
// source: 目标文件原有的列表（将被覆盖的）
// target: 本次写入的列表
export function calculateDiff(source: BookmarkList, target: BookmarkList): DiffResult {
  const sourceMap = new Map(source.map((item) => [item.location, item]))
  const targetMap = new Map(target.map((item) => [item.location, item]))

  const added: DiffItem[] = []
  const removed: DiffItem[] = []
  const modified: DiffItem[] = []

  // 查找新增和修改（名称变更）
  for (const item of target) {
    const previous = sourceMap.get(item.location)
    if (!previous) {
      added.push({ type: 'added', location: item.location, label: item.label })
    } else if (previous.label !== item.label) {
      modified.push({ type: 'modified', location: item.location, label: item.label, oldLabel: previous.label })
    }
  }

  // 查找删除
  for (const item of source) {
    if (!targetMap.has(item.location)) {
      removed.push({ type: 'removed', location: item.location, label: item.label })
    }
  }

  // 只比较两边都存在的条目的顺序
  const sourceOrder = source.filter((item) => targetMap.has(item.location)).map((item) => item.location)
  const targetOrder = target.filter((item) => sourceMap.has(item.location)).map((item) => item.location)
  const reordered = sourceOrder.some((location, index) => targetOrder[index] !== location)

  return {
    added,
    removed,
    modified,
    reordered,
    hasChanges: added.length > 0 || removed.length > 0 || modified.length > 0 || reordered,
  }
}

// 变更数量（重排计为一次）
export function countChanges(diff: DiffResult): number {
  return diff.added.length + diff.removed.length + diff.modified.length + (diff.reordered ? 1 : 0)
}
