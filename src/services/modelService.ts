import i18n from '../i18n';
import { InstallProgressCallback, RecognitionEngine } from '../types/engine';
import { TranscriptionError, isFatalError, toErrorMessage } from '../utils/errorHandling';

/**
 * Normalizes a locale identifier to BCP-47 form so that `en_US` and `en-US`
 * compare equal. Unparseable identifiers are returned with `_` replaced.
 */
export function normalizeLocale(locale: string): string {
    const dashed = locale.trim().replace(/_/g, '-');
    try {
        return Intl.getCanonicalLocales(dashed)[0] ?? dashed;
    } catch (error) {
        console.warn(`[ModelService] Non-canonical locale "${locale}":`, toErrorMessage(error));
        return dashed;
    }
}

/**
 * Human-readable label for a locale, e.g. `English (United States) (en-US)`.
 */
export function localeDisplayName(locale: string, displayLanguage: string = 'en'): string {
    const id = normalizeLocale(locale);
    let name: string | undefined;
    try {
        name = new Intl.DisplayNames([displayLanguage], { type: 'language' }).of(id);
    } catch (error) {
        console.warn(`[ModelService] No display name for "${id}":`, toErrorMessage(error));
    }
    return name && name !== id ? `${name} (${id})` : id;
}

function containsLocale(list: string[], locale: string): boolean {
    const target = normalizeLocale(locale);
    return list.some((candidate) => normalizeLocale(candidate) === target);
}

export interface LocaleStatus {
    supported: boolean;
    installed: boolean;
}

/**
 * Checks and provisions recognition models per locale.
 */
export class ModelService {
    constructor(private readonly engine: RecognitionEngine) { }

    /**
     * Support and installation state of one locale, from a single engine query.
     */
    async lookup(locale: string): Promise<LocaleStatus> {
        const { supported, installed } = await this.engine.getLocales();
        return {
            supported: containsLocale(supported, locale),
            installed: containsLocale(installed, locale),
        };
    }

    async isSupported(locale: string): Promise<boolean> {
        return (await this.lookup(locale)).supported;
    }

    async isInstalled(locale: string): Promise<boolean> {
        return (await this.lookup(locale)).installed;
    }

    /**
     * Makes sure the model for a locale is installed, downloading it if needed.
     *
     * @param locale The requested locale.
     * @param onProgress Download progress (0-100).
     * @throws {TranscriptionError} `LocaleUnsupported` or `ModelProvisioningFailed`.
     */
    async ensureModel(locale: string, onProgress?: InstallProgressCallback): Promise<void> {
        const id = normalizeLocale(locale);

        let status: LocaleStatus;
        try {
            status = await this.lookup(id);
        } catch (error) {
            if (isFatalError(error)) throw error;
            throw new TranscriptionError(
                'ModelProvisioningFailed',
                i18n.t('errors.modelProvisioningFailed', { locale: id, reason: toErrorMessage(error) }),
                { cause: error }
            );
        }

        if (!status.supported) {
            throw new TranscriptionError('LocaleUnsupported', i18n.t('errors.localeUnsupported', { locale: id }));
        }

        if (status.installed) {
            return;
        }

        console.log(`[ModelService] Model for ${id} not installed, downloading...`);
        try {
            await this.engine.installLocale(id, onProgress);
        } catch (error) {
            if (isFatalError(error)) throw error;
            throw new TranscriptionError(
                'ModelProvisioningFailed',
                i18n.t('errors.modelProvisioningFailed', { locale: id, reason: toErrorMessage(error) }),
                { cause: error }
            );
        }
        console.log(`[ModelService] Model for ${id} installed`);
    }

    /**
     * Installed locales, sorted by display name.
     */
    async listInstalledLocales(displayLanguage: string = 'en'): Promise<string[]> {
        const { installed } = await this.engine.getLocales();
        const unique = Array.from(new Set(installed.map(normalizeLocale)));
        return unique.sort((a, b) => localeDisplayName(a, displayLanguage).localeCompare(localeDisplayName(b, displayLanguage)));
    }

    /**
     * Picks the default locale: the preferred locale
     * if installed, else the first English locale, else the first installed one.
     *
     * @return The locale, or null if nothing is installed.
     */
    async pickDefaultLocale(preferred?: string): Promise<string | null> {
        const installed = await this.listInstalledLocales();
        if (preferred && containsLocale(installed, preferred)) {
            return normalizeLocale(preferred);
        }
        return installed.find((locale) => locale.startsWith('en')) ?? installed[0] ?? null;
    }
}
