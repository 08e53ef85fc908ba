import { LoggerProxy } from 'n8n-workflow';
import type { DisplayKey } from '../enums/types';

/** gettext-style lookup: source message plus optional context to translated text */
export type TranslateFn = (message: string, context?: string) => string;

let installed: TranslateFn | undefined;
let warnedMissing = false;

/**
 * Install the translation function used to resolve display labels.
 * May be called any time after the catalog has loaded; labels are resolved on request.
 */
export function installTranslation(fn: TranslateFn): void {
    installed = fn;
}

/** Remove the installed translation; labels fall back to their source messages. */
export function uninstallTranslation(): void {
    installed = undefined;
    warnedMissing = false;
}

export function isTranslationInstalled(): boolean {
    return installed !== undefined;
}

/** Resolve a display key through the installed translation. */
export function translate(key: DisplayKey): string {
    if (installed) return installed(key.message, key.context);
    if (!warnedMissing) {
        warnedMissing = true;
        LoggerProxy.warn('Display label requested before a translation was installed; using source messages', {
            message: key.message,
        });
    }
    return key.message;
}

/** Display key for a plain translatable message */
export const label = (message: string): DisplayKey => ({ message });

/** Display key for a message disambiguated by context */
export const contextLabel = (context: string, message: string): DisplayKey => ({ message, context });
