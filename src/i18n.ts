import i18next from 'i18next';
import en from './locales/en.json';
import zh from './locales/zh.json';
import { AppConfig } from './types/transcript';

const i18n = i18next.createInstance();

// Resources are bundled, so initialization completes synchronously.
i18n
    .init({
        resources: {
            en: { translation: en },
            zh: { translation: zh },
        },
        lng: 'en',
        fallbackLng: 'en',
        interpolation: {
            // Messages go to a terminal, not HTML; paths must stay readable.
            escapeValue: false,
        },
        initImmediate: false,
    })
    .catch((error: unknown) => {
        console.error('[i18n] Failed to initialize:', error);
    });

/**
 * Resolves the configured message language against the system locale.
 *
 * @param appLanguage The configured preference.
 * @param systemLocale The system locale identifier, e.g. `zh-CN`.
 * @return A bundled language code.
 */
export function resolveAppLanguage(appLanguage: AppConfig['appLanguage'], systemLocale: string): 'en' | 'zh' {
    if (appLanguage !== 'auto') {
        return appLanguage;
    }
    return systemLocale.toLowerCase().startsWith('zh') ? 'zh' : 'en';
}

/**
 * Switches the message language.
 */
export function setAppLanguage(language: 'en' | 'zh'): void {
    i18n.changeLanguage(language).catch((error: unknown) => {
        console.error('[i18n] Failed to change language:', error);
    });
}

export default i18n;
