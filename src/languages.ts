import { InvalidInputError } from "./errors";

/** Languages users may ask and be answered in. */
export const LANGUAGES = ["uz", "ru", "en"] as const;
export type Language = (typeof LANGUAGES)[number];

/** Fixed user-facing strings for one language. */
export interface LanguageSettings {
  /** Language name as written in that language. */
  label: string;
  /** Follow-up prompt appended to every answer. */
  askMore: string;
}

export const LANGUAGE_SETTINGS: Readonly<Record<Language, LanguageSettings>> = {
  uz: {
    label: "O'zbek",
    askMore: "Yana savollaringiz bormi?",
  },
  ru: {
    label: "Русский",
    askMore: "Есть ли у вас другие вопросы?",
  },
  en: {
    label: "English",
    askMore: "Do you have any other questions?",
  },
};

export function isLanguage(value: string): value is Language {
  return (LANGUAGES as readonly string[]).includes(value);
}

/**
 * Normalize and validate a language code ("EN", " ru ").
 *
 * @throws {InvalidInputError} For anything outside {@link LANGUAGES}.
 */
export function parseLanguage(value: string): Language {
  const code = value.trim().toLowerCase();
  if (!isLanguage(code)) {
    throw new InvalidInputError(
      `Unsupported language "${value}" (expected one of ${LANGUAGES.join(", ")})`,
    );
  }
  return code;
}
