import { localize } from '../../../i18n/localize';
import type { LookupTaskRequest } from '../../../types/service';
import { ExtensionLogger } from '../../../utils/logger';
import type { DictionaryHttpClient } from '../../DictionaryHttpClient';
import { LookupTask, type TaskOutput } from '../../LookupTask';
import type { SecretStorageService } from '../../SecretStorageService';
import { parseLexicalaResponse } from './parser';

export const LEXICALA_SERVER = 'https://lexicala1.p.rapidapi.com';
export const LEXICALA_HOST = 'lexicala1.p.rapidapi.com';

// RapidAPI reports refused requests as `{ message }` or `{ error }` without results.
function serviceError(body: unknown): string | undefined {
  if (typeof body !== 'object' || body === null || ('results' in body && Array.isArray(body.results))) {
    return undefined;
  }

  const error = 'error' in body ? body.error : undefined;
  const message = 'message' in body ? body.message : undefined;

  for (const value of [error, message]) {
    if (typeof value === 'string' && value.trim()) {
      return value.trim();
    }
  }

  return undefined;
}

export interface LexicalaTaskDependencies {
  http: DictionaryHttpClient;
  secrets: SecretStorageService;
  logger: ExtensionLogger;
  timeoutMs: number;
  uiLanguage: string;
  onResponse?: (headers: Headers) => void;
}

export class LexicalaLookupTask extends LookupTask {
  constructor(
    request: LookupTaskRequest,
    private readonly deps: LexicalaTaskDependencies,
  ) {
    super('lexicala', request, deps.logger);
  }

  protected async execute(): Promise<TaskOutput> {
    const key = await this.deps.secrets.getServiceCredential('lexicala');

    if (!key) {
      return {
        html: '',
        plaintext: '',
        error: {
          message: localize('lookup.missingToken', { service: this.serviceName }, { language: this.deps.uiLanguage }),
          code: 'configuration',
        },
      };
    }

    const { options } = this.request;
    const query = new URLSearchParams({
      source: String(options.source ?? 'global'),
      language: this.langFrom,
      text: this.text,
      morph: String(options.morph === true),
      analyzed: String(options.analyzed === true),
    });

    const attempt = await this.deps.http.getFirstAvailable([LEXICALA_SERVER], {
      path: `/search?${query.toString()}`,
      headers: {
        'X-RapidAPI-Host': LEXICALA_HOST,
        'X-RapidAPI-Key': key,
      },
      timeoutMs: this.deps.timeoutMs,
      validate: (body) => typeof body === 'object' && body !== null,
    });

    if (!attempt.ok) {
      return this.serverFailure(attempt.server, attempt.error);
    }

    this.deps.onResponse?.(attempt.headers);
    const failure = serviceError(attempt.body);

    if (failure) {
      return this.serviceFailure(failure, attempt.server);
    }

    const entry = parseLexicalaResponse(attempt.body, { target: this.langTo, language: this.langTo });

    return { ...entry, server: attempt.server };
  }
}
