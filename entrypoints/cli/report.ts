import type { DecodeWarning, SyncResult, TargetResult } from '../../lib/bookmark/types'
import type { DiffResult } from '../../lib/bookmark/diff'
import { getErrorI18nKey } from '../../lib/errors'
import i18n from '../../lib/i18n'

// 输出行：stdout 为状态，stderr 为警告和错误
export interface ReportLine {
  stream: 'out' | 'err'
  text: string
}

export function describeWarning(warning: DecodeWarning): string {
  const where =
    warning.line !== undefined
      ? i18n.t('warning.line', { n: warning.line })
      : i18n.t('warning.entry', { n: warning.entry ?? 0 })
  return i18n.t(`warning.${warning.kind}`, { where, raw: warning.raw })
}

export function formatDiff(diff: DiffResult): string {
  const counts = i18n.t('cli.diff', {
    added: diff.added.length,
    removed: diff.removed.length,
    modified: diff.modified.length,
  })
  return diff.reordered ? counts + i18n.t('cli.reordered') : counts
}

function formatTarget(target: TargetResult): ReportLine[] {
  if (target.status === 'failed') {
    return [
      {
        stream: 'err',
        text: i18n.t('cli.targetFailed', {
          format: target.format,
          reason: i18n.t(getErrorI18nKey(target.errorType)),
          path: target.path,
        }),
      },
      { stream: 'err', text: i18n.t('cli.targetDetail', { detail: target.error }) },
    ]
  }

  const lines: ReportLine[] = [
    {
      stream: 'out',
      text: i18n.t('cli.target', {
        format: target.format,
        status: i18n.t(`cli.status.${target.status}`),
        changes: formatDiff(target.diff),
        path: target.path,
      }),
    },
  ]
  if (target.previousError !== undefined) {
    lines.push({ stream: 'err', text: i18n.t('cli.previousReplaced', { format: target.format }) })
  }
  return lines
}

// 将同步结果格式化为 CLI 输出
export function formatReport(result: SyncResult, sourcePath: string): ReportLine[] {
  const lines: ReportLine[] = result.warnings.map((warning) => ({
    stream: 'err',
    text: i18n.t('cli.warning', { message: describeWarning(warning) }),
  }))

  // 源文件阶段失败：没有任何目标被处理
  if (!result.success && result.targets.length === 0) {
    lines.push({
      stream: 'err',
      text: i18n.t('cli.error', { reason: i18n.t(getErrorI18nKey(result.errorType)), path: sourcePath }),
    })
    return lines
  }

  for (const target of result.targets) {
    lines.push(...formatTarget(target))
  }
  if (result.success) {
    lines.push({ stream: 'out', text: i18n.t('cli.done', { changes: result.changes }) })
  }
  return lines
}
