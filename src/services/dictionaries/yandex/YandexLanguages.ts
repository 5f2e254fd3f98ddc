import type { LanguagePair } from '../../../types/lookup';
import { ExtensionLogger } from '../../../utils/logger';
import { ServiceLanguages } from '../../languages/ServiceLanguages';
import bundledLanguages from './languages.json';

export class YandexLanguages extends ServiceLanguages {
  constructor(storagePath: string, logger: ExtensionLogger, uiLanguage?: string) {
    super('yandex', bundledLanguages, storagePath, logger, uiLanguage);
  }

  protected parseCatalog(raw: unknown): LanguagePair[] | undefined {
    if (!Array.isArray(raw)) {
      return undefined;
    }

    const pairs: LanguagePair[] = [];

    for (const item of raw) {
      if (typeof item !== 'string') {
        continue;
      }

      const [source, target, ...rest] = item.split('-');

      if (source && target && rest.length === 0) {
        pairs.push({ source, target });
      }
    }

    return pairs;
  }
}
