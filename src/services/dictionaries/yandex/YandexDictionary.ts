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
import { YandexLanguages } from './YandexLanguages';
import { YandexLookupTask } from './YandexLookupTask';

export const YANDEX_DIRECT_SERVER = 'https://dictionary.yandex.net';
export const YANDEX_MIRROR_SERVER = 'https://info.alwaysdata.net';

export class YandexDictionary extends BaseDictionaryService {
  readonly name = 'yandex';
  readonly summary = 'Yandex Dictionaries';
  readonly sortKey = 1;
  readonly languages: YandexLanguages;

  constructor(context: ServiceContext) {
    super(context);
    this.languages = new YandexLanguages(context.storagePath, context.logger, context.uiLanguage);
  }

  protected get serviceOptions(): ServiceOptionSchema {
    return {
      mirror: { type: 'boolean', default: false },
    };
  }

  servers(options: ServiceOptions): string[] {
    return options.mirror === true
      ? [YANDEX_MIRROR_SERVER, YANDEX_DIRECT_SERVER]
      : [YANDEX_DIRECT_SERVER, YANDEX_MIRROR_SERVER];
  }

  createTask(request: LookupTaskRequest): LookupTask {
    return new YandexLookupTask(request, {
      http: this.context.http,
      secrets: this.context.secrets,
      logger: this.context.logger,
      servers: this.servers(request.options),
      timeoutMs: this.context.timeoutMs,
      uiLanguage: this.context.uiLanguage,
      onResponse: (headers) => this.recordResponse(headers),
    });
  }

  createSettingsPanel(): SettingsPanelDescriptor {
    return this.buildSettingsPanel([
      { option: 'mirror', label: 'Use the alternative server', kind: 'checkbox' },
      { option: 'token', label: 'API access token', kind: 'secret' },
    ]);
  }

  async refreshLanguages(options: ServiceOptions): Promise<number> {
    const token = await this.context.secrets.getServiceCredential(this.name);

    if (!token) {
      throw new DictionaryProviderError(
        localize('lookup.missingToken', { service: this.name }, { language: this.context.uiLanguage }),
        {
          code: 'configuration',
        },
      );
    }

    const attempt = await this.context.http.getFirstAvailable(this.servers(options), {
      path: `/api/v1/dicservice.json/getLangs?${new URLSearchParams({ key: token }).toString()}`,
      timeoutMs: this.context.timeoutMs,
      validate: Array.isArray,
    });

    if (!attempt.ok) {
      throw attempt.error;
    }

    const updated = await this.languages.update(attempt.body);
    return updated ? this.languages.size : 0;
  }
}

export const yandexModule: ServiceModule = {
  id: 'yandex',
  register: (registry, context) => {
    registry.add(new YandexDictionary(context));
  },
};
