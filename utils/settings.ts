import { readFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { join } from 'node:path'
import { isErrnoException } from '../lib/errors'
import { detectLanguage, isLanguageCode, type LanguageCode } from '../lib/i18n'

// 应用设置
export interface AppSettings {
  language: LanguageCode
  verbose: boolean
  dryRun: boolean
}

const DEFAULT_SETTINGS: Omit<AppSettings, 'language'> = {
  verbose: false,
  dryRun: false,
}

const CONFIG_DIR = 'places-sync'
const CONFIG_FILE = 'config.json'

// 用户主目录：优先 $HOME
export function resolveHomeDirectory(env: NodeJS.ProcessEnv): string {
  return env.HOME || homedir()
}

// 配置文件路径（遵循 XDG_CONFIG_HOME）
export function getConfigPath(env: NodeJS.ProcessEnv, homeDirectory: string): string {
  const configHome = env.XDG_CONFIG_HOME || join(homeDirectory, '.config')
  return join(configHome, CONFIG_DIR, CONFIG_FILE)
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

// 读取配置文件，文件缺失返回空对象，内容无效时警告并忽略
export async function readConfigFile(path: string): Promise<Partial<AppSettings>> {
  let content: string
  try {
    content = await readFile(path, 'utf8')
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return {}
    console.warn('[Settings] 无法读取配置文件，已忽略:', path, err)
    return {}
  }

  let data: unknown
  try {
    data = JSON.parse(content)
  } catch (err) {
    console.warn('[Settings] 配置文件不是有效的 JSON，已忽略:', path, err)
    return {}
  }
  if (!isRecord(data)) {
    console.warn('[Settings] 配置文件必须是 JSON 对象，已忽略:', path)
    return {}
  }

  const settings: Partial<AppSettings> = {}
  if (typeof data.language === 'string') {
    if (isLanguageCode(data.language)) {
      settings.language = data.language
    } else {
      console.warn('[Settings] 不支持的语言，已忽略:', data.language)
    }
  }
  if (typeof data.verbose === 'boolean') {
    settings.verbose = data.verbose
  }
  return settings
}

// 去掉未指定的覆盖项
function definedOnly(overrides: Partial<AppSettings>): Partial<AppSettings> {
  const result: Partial<AppSettings> = {}
  if (overrides.language !== undefined) result.language = overrides.language
  if (overrides.verbose !== undefined) result.verbose = overrides.verbose
  if (overrides.dryRun !== undefined) result.dryRun = overrides.dryRun
  return result
}

// 合并设置：默认值 < 配置文件 < 命令行
export async function resolveSettings(
  env: NodeJS.ProcessEnv,
  homeDirectory: string,
  overrides: Partial<AppSettings> = {}
): Promise<AppSettings> {
  const fromFile = await readConfigFile(getConfigPath(env, homeDirectory))
  return {
    ...DEFAULT_SETTINGS,
    language: detectLanguage(env),
    ...fromFile,
    ...definedOnly(overrides),
  }
}
