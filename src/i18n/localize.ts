type SupportedLocale = 'en' | 'uk';

type LocalizationParams = Record<string, string | number>;

type TranslationEntry = Record<SupportedLocale, string>;

const translations = {
  'entry.number': {
    en: 'number',
    uk: 'число',
  },
  'entry.gender': {
    en: 'gender',
    uk: 'рід',
  },
  'entry.mean': {
    en: 'Mean',
    uk: 'Значення',
  },
  'entry.synonyms': {
    en: 'Synonyms',
    uk: 'Синоніми',
  },
  'entry.examples': {
    en: 'Examples',
    uk: 'Приклади',
  },
  'entry.unrecognized': {
    en: 'Unrecognized dictionary response.',
    uk: 'Нерозпізнана відповідь словника.',
  },
  'lookup.noResults': {
    en: 'No results',
    uk: 'Немає результатів',
  },
  'lookup.noSelection': {
    en: 'There is no selected text, the clipboard is also empty, or its content is not text!',
    uk: 'Немає виділеного тексту, буфер обміну також порожній або його вміст не є текстом!',
  },
  'lookup.languages': {
    en: 'Translate: from {from} to {into}',
    uk: 'Переклад: з {from} на {into}',
  },
  'lookup.missingToken': {
    en: 'Access token for {service} is not set.',
    uk: 'Токен доступу для {service} не встановлено.',
  },
  'lookup.failure': {
    en: 'Dictionary lookup failed. Check logs.',
    uk: 'Не вдалося виконати пошук у словнику. Перегляньте журнал.',
  },
  'swap.done': {
    en: 'Languages swapped',
    uk: 'Мови переставлено',
  },
  'swap.unavailable': {
    en: 'Swap languages is not available for this pair',
    uk: 'Перестановка мов недоступна для цієї пари',
  },
  'lastResult.none': {
    en: 'There is no dictionary queries',
    uk: 'Немає запитів до словника',
  },
  'profiles.selected': {
    en: 'Profile {slot} selected: {title}',
    uk: 'Вибрано профіль {slot}: {title}',
  },
  'profiles.empty': {
    en: 'Profile {slot} is empty',
    uk: 'Профіль {slot} порожній',
  },
  'profiles.saved': {
    en: 'Profile {slot} saved: {title}',
    uk: 'Профіль {slot} збережено: {title}',
  },
  'profiles.removed': {
    en: 'Profile {slot} removed',
    uk: 'Профіль {slot} видалено',
  },
  'profiles.none': {
    en: 'There are no saved profiles',
    uk: 'Немає збережених профілів',
  },
  'profiles.list': {
    en: 'Saved profiles: {profiles}',
    uk: 'Збережені профілі: {profiles}',
  },
  'profiles.language': {
    en: 'Profile {slot} language: {language}',
    uk: 'Мова профілю {slot}: {language}',
  },
  'profiles.applyFailed': {
    en: 'Unable to apply profile {slot}',
    uk: 'Не вдалося застосувати профіль {slot}',
  },
  'profiles.restored': {
    en: 'Default voice restored: {title}',
    uk: 'Стандартний голос відновлено: {title}',
  },
  'profiles.failure': {
    en: 'Unable to update synthesizer profiles. Check logs.',
    uk: 'Не вдалося оновити профілі синтезатора. Перегляньте журнал.',
  },
  'languages.updated': {
    en: 'Languages list updated: {count} language pairs',
    uk: 'Список мов оновлено: {count} мовних пар',
  },
  'languages.unchanged': {
    en: 'The languages list was not changed',
    uk: 'Список мов не змінено',
  },
  'languages.failure': {
    en: 'Unable to update the languages list. Check logs.',
    uk: 'Не вдалося оновити список мов. Перегляньте журнал.',
  },
  'statistics.quota': {
    en: 'Requests remaining: {remaining} of {limit}',
    uk: 'Залишилося запитів: {remaining} з {limit}',
  },
  'token.stored': {
    en: 'Access token for {service} stored.',
    uk: 'Токен доступу для {service} збережено.',
  },
  'token.cleared': {
    en: 'Access token for {service} cleared.',
    uk: 'Токен доступу для {service} видалено.',
  },
  'token.failure': {
    en: 'Unable to store the access token. Check logs for details.',
    uk: 'Не вдалося зберегти токен доступу. Перегляньте журнал.',
  },
} as const satisfies Record<string, TranslationEntry>;

export type TranslationKey = keyof typeof translations;

function normalizeLocale(language?: string): SupportedLocale {
  const value = (language ?? Intl.DateTimeFormat().resolvedOptions().locale ?? '').toLowerCase();

  if (value.startsWith('uk')) {
    return 'uk';
  }

  return 'en';
}

function format(template: string, params?: LocalizationParams): string {
  if (!params) {
    return template;
  }

  return template.replace(/\{(\w+)\}/g, (match, token: string) => {
    const replacement = params[token];

    if (replacement === undefined || replacement === null) {
      return '';
    }

    return String(replacement);
  });
}

export function localize(
  key: TranslationKey,
  params?: LocalizationParams,
  options?: { language?: string },
): string {
  const locale = normalizeLocale(options?.language);
  const entry: TranslationEntry = translations[key];
  const template = entry[locale] ?? entry.en ?? key;
  return format(template, params);
}
