import i18n from 'i18next'
import en from './locales/en.json'
import zhCN from './locales/zh-CN.json'

export const supportedLanguages = [
  { code: 'zh-CN', name: '简体中文' },
  { code: 'en', name: 'English' },
] as const

export type LanguageCode = (typeof supportedLanguages)[number]['code']

export function isLanguageCode(value: string): value is LanguageCode {
  return supportedLanguages.some((lang) => lang.code === value)
}

// 从 locale 环境变量检测语言（优先级同 gettext）
export function detectLanguage(env: NodeJS.ProcessEnv): LanguageCode {
  const locale = env.LC_ALL || env.LC_MESSAGES || env.LANG || ''
  if (locale.toLowerCase().startsWith('zh')) return 'zh-CN'
  return 'en'
}

// 初始化 i18n，重复调用时只切换语言
export async function initI18n(lang: LanguageCode): Promise<void> {
  if (i18n.isInitialized) {
    await i18n.changeLanguage(lang)
    return
  }

  await i18n.init({
    resources: {
      en: { translation: en },
      'zh-CN': { translation: zhCN },
    },
    lng: lang,
    fallbackLng: 'en',
    initImmediate: false,
    interpolation: {
      escapeValue: false,
    },
  })
}

export default i18n
