import type { LanguagePair } from '../../../types/lookup';
import { ExtensionLogger } from '../../../utils/logger';
import { ServiceLanguages } from '../../languages/ServiceLanguages';
import bundledLanguages from './languages.json';

function codes(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string' && item !== '') : [];
}

// Pairs are the union over every resource: a source of one resource may be
// combined with a target of another.
export class LexicalaLanguages extends ServiceLanguages {
  constructor(storagePath: string, logger: ExtensionLogger, uiLanguage?: string) {
    super('lexicala', bundledLanguages, storagePath, logger, uiLanguage);
  }

  protected parseCatalog(raw: unknown): LanguagePair[] | undefined {
    if (typeof raw !== 'object' || raw === null || !('resources' in raw)) {
      return undefined;
    }

    const resources = raw.resources;

    if (typeof resources !== 'object' || resources === null) {
      return undefined;
    }

    const sources = new Set<string>();
    const targets = new Set<string>();

    for (const resource of Object.values(resources)) {
      if (typeof resource !== 'object' || resource === null) {
        continue;
      }

      if ('source_languages' in resource) {
        codes(resource.source_languages).forEach((code) => sources.add(code));
      }

      if ('target_languages' in resource) {
        codes(resource.target_languages).forEach((code) => targets.add(code));
      }
    }

    const pairs: LanguagePair[] = [];

    for (const source of sources) {
      for (const target of targets) {
        if (source !== target) {
          pairs.push({ source, target });
        }
      }
    }

    return pairs;
  }
}
