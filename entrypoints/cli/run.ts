import { resolve } from 'node:path'
import { parseArgs } from 'node:util'
import { SyncEngine } from '../../lib/sync'
import { getFormatByName } from '../../lib/bookmark/formats'
import i18n, { detectLanguage, initI18n, isLanguageCode } from '../../lib/i18n'
import { resolveHomeDirectory, resolveSettings } from '../../utils/settings'
import { formatReport } from './report'
import pkg from '../../package.json'

// 输出通道（测试时替换）
export interface CliIO {
  out(text: string): void
  err(text: string): void
}

const consoleIO: CliIO = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
}

// 退出码
export const EXIT_OK = 0
export const EXIT_FAILURE = 1
export const EXIT_USAGE = 2

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      'sync-from': { type: 'string', short: 'f' },
      'base-dir': { type: 'string', short: 'd' },
      'dry-run': { type: 'boolean', short: 'n' },
      verbose: { type: 'boolean', short: 'v' },
      lang: { type: 'string' },
      version: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
    strict: true,
    allowPositionals: false,
  }).values
}

// 用法错误：输出原因和帮助
function usageError(io: CliIO, message: string): number {
  io.err(message)
  io.err('')
  io.err(i18n.t('cli.usage'))
  return EXIT_USAGE
}

export async function run(argv: string[], env: NodeJS.ProcessEnv, io: CliIO = consoleIO): Promise<number> {
  let values: ReturnType<typeof parseCliArgs>
  try {
    values = parseCliArgs(argv)
  } catch (err) {
    await initI18n(detectLanguage(env))
    return usageError(io, i18n.t('cli.usageError', { message: err instanceof Error ? err.message : String(err) }))
  }

  const lang = values.lang
  if (lang !== undefined && !isLanguageCode(lang)) {
    await initI18n(detectLanguage(env))
    return usageError(io, i18n.t('cli.unknownLanguage', { name: lang }))
  }

  const homeDirectory = resolveHomeDirectory(env)
  const settings = await resolveSettings(env, homeDirectory, {
    language: lang,
    verbose: values.verbose,
    dryRun: values['dry-run'],
  })
  await initI18n(settings.language)

  if (values.help) {
    io.out(i18n.t('cli.usage'))
    return EXIT_OK
  }
  if (values.version) {
    io.out(i18n.t('cli.version', { version: pkg.version }))
    return EXIT_OK
  }

  const sourceName = values['sync-from']
  if (!sourceName) {
    return usageError(io, i18n.t('cli.missingSource'))
  }
  const format = getFormatByName(sourceName)
  if (!format) {
    return usageError(io, i18n.t('cli.unknownFormat', { name: sourceName }))
  }

  const baseDirectory = resolve(values['base-dir'] ?? homeDirectory)
  io.out(i18n.t('cli.running', { source: format.id, base: baseDirectory }))
  if (settings.dryRun) {
    io.out(i18n.t('cli.dryRun'))
  }

  const engine = new SyncEngine({ baseDirectory, dryRun: settings.dryRun, verbose: settings.verbose })
  const result = await engine.sync(format.id)

  for (const line of formatReport(result, engine.resolvePath(format.id))) {
    if (line.stream === 'out') io.out(line.text)
    else io.err(line.text)
  }
  return result.success ? EXIT_OK : EXIT_FAILURE
}
