import fallbackNamesJson from '../../data/languageNames.json';

const FALLBACK_NAMES: Record<string, string> = fallbackNamesJson;

const displayNamesByLocale = new Map<string, Intl.DisplayNames | undefined>();

function getDisplayNames(locale: string): Intl.DisplayNames | undefined {
  if (!displayNamesByLocale.has(locale)) {
    let displayNames: Intl.DisplayNames | undefined;

    try {
      displayNames = new Intl.DisplayNames([locale, 'en'], { type: 'language', fallback: 'none' });
    } catch {
      displayNames = undefined;
    }

    displayNamesByLocale.set(locale, displayNames);
  }

  return displayNamesByLocale.get(locale);
}

function describe(code: string, locale: string): string | undefined {
  if (!code) {
    return undefined;
  }

  try {
    return getDisplayNames(locale)?.of(code);
  } catch {
    // Not a well-formed BCP 47 tag.
    return undefined;
  }
}

function capitalize(value: string): string {
  return value.charAt(0).toLocaleUpperCase() + value.slice(1);
}

export class Language {
  constructor(
    readonly code: string,
    private readonly locale = 'en',
  ) {}

  get name(): string {
    const described = describe(this.code, this.locale);

    if (described && described !== this.code) {
      return capitalize(described);
    }

    return FALLBACK_NAMES[this.code] ?? this.code;
  }

  toString(): string {
    return this.name;
  }
}
