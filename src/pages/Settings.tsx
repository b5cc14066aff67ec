/**
 * Settings Page
 * Language choice and app info
 */

import { useNavigate } from 'react-router-dom';
import { useTranslation } from 'react-i18next';
import { SUPPORTED_LANGUAGES, type AppLanguage } from '../i18n/languages';

const LANGUAGE_LABEL_KEYS: Record<AppLanguage, string> = {
  en: 'settings.english',
  ar: 'settings.arabic',
};

export default function Settings() {
  const navigate = useNavigate();
  const { t, i18n } = useTranslation();

  const changeLanguage = (language: AppLanguage) => {
    if (language === i18n.language) return;
    i18n.changeLanguage(language).catch((err: unknown) => {
      console.error('Failed to change language:', err);
    });
  };

  return (
    <div className="settings-page">
      <header className="settings-header glass-header">
        <button className="back-btn icon-btn" onClick={() => navigate(-1)} aria-label={t('common.back')}>
          <svg width="20" height="20" viewBox="0 0 24 24" fill="none" stroke="currentColor" strokeWidth="2.5" strokeLinecap="round" strokeLinejoin="round">
            <path d="M19 12H5M12 19l-7-7 7-7"/>
          </svg>
        </button>
        <h1>{t('settings.title')}</h1>
        <div className="header-spacer" />
      </header>

      <main className="settings-main">
        <section className="settings-section glass-card">
          <div className="section-header">
            <span className="section-icon">🌐</span>
            <h2>{t('settings.language')}</h2>
          </div>

          <div className="language-selector" role="radiogroup" aria-label={t('settings.language')}>
            {SUPPORTED_LANGUAGES.map((language) => (
              <button
                key={language}
                type="button"
                role="radio"
                aria-checked={i18n.language === language}
                className={`language-option ${i18n.language === language ? 'selected' : ''}`}
                onClick={() => changeLanguage(language)}
              >
                {t(LANGUAGE_LABEL_KEYS[language])}
              </button>
            ))}
          </div>
        </section>

        <section className="settings-section glass-card about-section">
          <div className="section-header">
            <span className="section-icon">ℹ️</span>
            <h2>{t('settings.about')}</h2>
          </div>
          <div className="about-info">
            <div className="app-logo">✈️</div>
            <h3>{t('app.name')}</h3>
            <p className="version">
              {t('settings.version')} {import.meta.env.VITE_APP_VERSION || '0.1.0'}
            </p>
            <p className="motto">{t('app.tagline')}</p>
          </div>
        </section>
      </main>
    </div>
  );
}
