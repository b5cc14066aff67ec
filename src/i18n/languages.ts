/**
 * Supported UI languages
 */

import type { VoiceLocale } from '../types/chat';

export const SUPPORTED_LANGUAGES = ['en', 'ar'] as const;
export type AppLanguage = (typeof SUPPORTED_LANGUAGES)[number];

const RTL_LANGUAGES = ['ar'];

export function isRtl(language: string): boolean {
  return RTL_LANGUAGES.includes(language.split('-')[0]);
}

/**
 * Speech locale matching the UI language
 */
export function voiceLocaleFor(language: string): VoiceLocale {
  return isRtl(language) ? 'ar-SA' : 'en-US';
}
