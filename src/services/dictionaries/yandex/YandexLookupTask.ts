import { localize } from '../../../i18n/localize';
import type { LookupTaskRequest } from '../../../types/service';
import { ExtensionLogger } from '../../../utils/logger';
import type { DictionaryHttpClient } from '../../DictionaryHttpClient';
import { LookupTask, type TaskOutput } from '../../LookupTask';
import type { SecretStorageService } from '../../SecretStorageService';
import { parseYandexResponse } from './parser';

export interface YandexTaskDependencies {
  http: DictionaryHttpClient;
  secrets: SecretStorageService;
  logger: ExtensionLogger;
  servers: readonly string[];
  timeoutMs: number;
  uiLanguage: string;
  onResponse?: (headers: Headers) => void;
}

// A lookup body carries either the `def` list or a service `error` string.
function isLookupResponse(body: unknown): boolean {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    return false;
  }

  return ('def' in body && Array.isArray(body.def)) || serviceError(body) !== undefined;
}

function serviceError(body: unknown): string | undefined {
  if (typeof body !== 'object' || body === null || !('error' in body)) {
    return undefined;
  }

  return typeof body.error === 'string' && body.error.trim() ? body.error.trim() : undefined;
}

export class YandexLookupTask extends LookupTask {
  constructor(
    request: LookupTaskRequest,
    private readonly deps: YandexTaskDependencies,
  ) {
    super('yandex', request, deps.logger);
  }

  protected async execute(): Promise<TaskOutput> {
    const token = await this.deps.secrets.getServiceCredential('yandex');

    if (!token) {
      return {
        html: '',
        plaintext: '',
        error: {
          message: localize('lookup.missingToken', { service: this.serviceName }, { language: this.deps.uiLanguage }),
          code: 'configuration',
        },
      };
    }

    const query = new URLSearchParams({
      key: token,
      lang: `${this.langFrom}-${this.langTo}`,
      text: this.text,
      ui: this.langTo,
    });

    const attempt = await this.deps.http.getFirstAvailable(this.deps.servers, {
      path: `/api/v1/dicservice.json/lookup?${query.toString()}`,
      timeoutMs: this.deps.timeoutMs,
      validate: isLookupResponse,
    });

    if (!attempt.ok) {
      return this.serverFailure(attempt.server, attempt.error);
    }

    this.deps.onResponse?.(attempt.headers);
    const failure = serviceError(attempt.body);

    if (failure) {
      return this.serviceFailure(failure, attempt.server);
    }

    const entry = parseYandexResponse(attempt.body, { language: this.langTo });

    return { ...entry, server: attempt.server };
  }
}
