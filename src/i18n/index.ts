/**
 * i18n Configuration
 * English and Arabic, with RTL layout for Arabic
 */

import i18n from 'i18next';
import { initReactI18next } from 'react-i18next';
import LanguageDetector from 'i18next-browser-languagedetector';

import en from './locales/en.json';
import ar from './locales/ar.json';
import { isRtl, SUPPORTED_LANGUAGES } from './languages';

// Update document direction based on language
export function updateDirection(language: string) {
  document.documentElement.setAttribute('dir', isRtl(language) ? 'rtl' : 'ltr');
  document.documentElement.setAttribute('lang', language);
}

i18n
  .use(LanguageDetector)
  .use(initReactI18next)
  .init({
    resources: {
      en: { translation: en },
      ar: { translation: ar },
    },
    fallbackLng: 'en',
    supportedLngs: [...SUPPORTED_LANGUAGES],
    interpolation: {
      escapeValue: false, // React already escapes values
    },
    detection: {
      order: ['localStorage', 'navigator'],
      caches: ['localStorage'],
    },
  })
  .catch((err: unknown) => {
    console.error('Failed to initialise translations:', err);
  });

// Set initial direction
updateDirection(i18n.language || 'en');

// Update direction when language changes
i18n.on('languageChanged', (lng) => {
  updateDirection(lng);
});

export default i18n;
