import { localize } from '../../../i18n/localize';
import type { ServiceOptionSchema, ServiceOptions } from '../../../types/config';
import type {
  LookupTaskRequest,
  ServiceContext,
  ServiceModule,
  SettingsPanelDescriptor,
} from '../../../types/service';
import { DictionaryProviderError } from '../../DictionaryHttpClient';
import type { LookupTask } from '../../LookupTask';
import { BaseDictionaryService } from '../BaseDictionaryService';
import { LexicalaLanguages } from './LexicalaLanguages';
import { LEXICALA_HOST, LEXICALA_SERVER, LexicalaLookupTask } from './LexicalaLookupTask';

export const LEXICALA_SOURCES = ['global', 'password', 'random'] as const;

export class LexicalaDictionary extends BaseDictionaryService {
  readonly name = 'lexicala';
  readonly summary = 'Lexicala Dictionaries';
  readonly sortKey = 2;
  readonly languages: LexicalaLanguages;

  constructor(context: ServiceContext) {
    super(context);
    this.languages = new LexicalaLanguages(context.storagePath, context.logger, context.uiLanguage);
  }

  protected get serviceOptions(): ServiceOptionSchema {
    return {
      source: { type: 'string', default: 'global' },
      morph: { type: 'boolean', default: false },
      analyzed: { type: 'boolean', default: false },
    };
  }

  createTask(request: LookupTaskRequest): LookupTask {
    return new LexicalaLookupTask(request, {
      http: this.context.http,
      secrets: this.context.secrets,
      logger: this.context.logger,
      timeoutMs: this.context.timeoutMs,
      uiLanguage: this.context.uiLanguage,
      onResponse: (headers) => this.recordResponse(headers),
    });
  }

  createSettingsPanel(): SettingsPanelDescriptor {
    const panel = this.buildSettingsPanel([
      { option: 'source', label: 'Data source', kind: 'choice', choices: [...LEXICALA_SOURCES] },
      { option: 'morph', label: 'Search in headwords and inflections', kind: 'checkbox' },
      { option: 'analyzed', label: 'Ignore diacritics and case', kind: 'checkbox' },
      { option: 'token', label: 'RapidAPI key', kind: 'secret' },
    ]);
    const { remaining, limit } = this.statistics;

    if (remaining !== undefined && limit !== undefined) {
      panel.status = localize(
        'statistics.quota',
        { remaining, limit },
        { language: this.context.uiLanguage },
      );
    }

    return panel;
  }

  async refreshLanguages(_options: ServiceOptions): Promise<number> {
    const key = await this.context.secrets.getServiceCredential(this.name);

    if (!key) {
      throw new DictionaryProviderError(
        localize('lookup.missingToken', { service: this.name }, { language: this.context.uiLanguage }),
        {
          code: 'configuration',
        },
      );
    }

    const attempt = await this.context.http.getFirstAvailable([LEXICALA_SERVER], {
      path: '/languages',
      headers: {
        'X-RapidAPI-Host': LEXICALA_HOST,
        'X-RapidAPI-Key': key,
      },
      timeoutMs: this.context.timeoutMs,
    });

    if (!attempt.ok) {
      throw attempt.error;
    }

    this.recordResponse(attempt.headers);
    const updated = await this.languages.update(attempt.body);
    return updated ? this.languages.size : 0;
  }
}

export const lexicalaModule: ServiceModule = {
  id: 'lexicala',
  register: (registry, context) => {
    registry.add(new LexicalaDictionary(context));
  },
};
