/**
 * 命令行 i18n 初始化
 * 使用 i18next（纯 Node.js），翻译资源为 locales/*.json
 */

import i18next, { type TOptions } from 'i18next'
import en from './locales/en.json'
import zh from './locales/zh.json'

/** 支持的语言列表 */
export const SUPPORTED_LANGUAGES = ['en', 'zh'] as const
export type SupportedLanguage = (typeof SUPPORTED_LANGUAGES)[number]

/** 将 locale 映射到支持的语言（如 zh-CN → zh、en-US → en） */
export function resolveLanguage(locale: string): SupportedLanguage {
  const lang = locale.split(/[-_]/)[0].toLowerCase()
  return SUPPORTED_LANGUAGES.find((supported) => supported === lang) ?? 'en'
}

/** 初始化 i18next（启动时调用一次） */
export async function initI18n(language: string): Promise<void> {
  await i18next.init({
    lng: resolveLanguage(language),
    fallbackLng: 'en',
    interpolation: { escapeValue: false },
    resources: {
      en: { translation: en },
      zh: { translation: zh }
    }
  })
}

/** 翻译函数 */
export function t(key: string, params?: TOptions): string {
  return String(i18next.t(key, params ?? {}))
}
