import i18next, { type InitOptions, type TOptions } from "i18next";
import type { SupportedLanguage, TranslationNamespace, NestedKeyOf } from "./types.js";

export type { SupportedLanguage, TranslationNamespace, NestedKeyOf };
export { SUPPORTED_LANGUAGES, isSupportedLanguage } from "./types.js";

// English translations
import enCommon from "./locales/en/common.json";
import enErrors from "./locales/en/errors.json";

// Korean translations
import koCommon from "./locales/ko/common.json";
import koErrors from "./locales/ko/errors.json";

// ============================================================================
// JSON-inferred types for type-safe translation access
// ============================================================================
//
// The English catalogs are the source of truth; keys missing from another
// language fall back to English.

/** JSON-inferred type for common.json translations */
export type CommonJSON = typeof enCommon;
/** JSON-inferred type for errors.json translations */
export type ErrorsJSON = typeof enErrors;

export type CommonKey = NestedKeyOf<CommonJSON>;
export type ErrorsKey = NestedKeyOf<ErrorsJSON>;

// ============================================================================
// i18next initialization
// ============================================================================

const BASE_OPTIONS: InitOptions = {
  fallbackLng: "en",
  ns: ["common", "errors"],
  defaultNS: "common",
  // Messages end up in a terminal or a log file, never in HTML; escaping
  // would mangle file paths.
  interpolation: { escapeValue: false },
  resources: {
    en: { common: enCommon, errors: enErrors },
    ko: { common: koCommon, errors: koErrors },
  },
};

export async function initI18n(language: SupportedLanguage = "en") {
  await i18next.init({ ...BASE_OPTIONS, lng: language });
  return i18next;
}

/**
 * Library callers may never call initI18n(); resources are bundled, so a
 * synchronous English init is enough to make t() usable.
 */
function ensureInitialized(): void {
  if (i18next.isInitialized) return;
  i18next
    .init({ ...BASE_OPTIONS, lng: "en", initImmediate: false })
    .catch((error: unknown) => {
      console.error("Failed to initialize message catalogs:", error);
    });
}

/**
 * Translation function.
 *
 * Usage examples:
 *   t('common:plugins.removed', { name: 'word-count' })
 *   t('errors:codes.plugin_not_found.medium', { name: 'word-count' })
 */
export function t(key: string, options?: TOptions): string {
  ensureInitialized();
  return String(i18next.t(key, options));
}

export function getCurrentLanguage(): SupportedLanguage {
  return i18next.language === "ko" ? "ko" : "en";
}

export async function changeLanguage(language: SupportedLanguage): Promise<void> {
  ensureInitialized();
  await i18next.changeLanguage(language);
}
