import type { ServiceOptionSchema, ServiceOptions } from '../../types/config';
import type {
  DictionaryService,
  LookupTaskRequest,
  ServiceContext,
  ServiceStatistics,
  SettingsPanelDescriptor,
  SettingsPanelField,
} from '../../types/service';
import type { LookupTask } from '../LookupTask';
import type { ServiceLanguages } from '../languages/ServiceLanguages';

export class ServiceNotImplementedError extends Error {
  readonly serviceName: string;
  readonly capability: string;

  constructor(serviceName: string, capability: string) {
    super(`Dictionary service "${serviceName}" does not implement ${capability}.`);
    this.name = 'ServiceNotImplementedError';
    this.serviceName = serviceName;
    this.capability = capability;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ServiceNotImplementedError);
    }
  }
}

const COMMON_FIELDS: SettingsPanelField[] = [
  { option: 'from', label: 'Source language', kind: 'language' },
  { option: 'into', label: 'Target language', kind: 'language' },
  { option: 'autoswap', label: 'Auto-swap languages', kind: 'checkbox' },
  { option: 'copytoclip', label: 'Copy dictionary response to clipboard', kind: 'checkbox' },
  { option: 'switchsynth', label: 'Switch synthesizer to the target language voice', kind: 'checkbox' },
];

export abstract class BaseDictionaryService implements DictionaryService {
  index = 0;
  abstract readonly name: string;
  abstract readonly summary: string;
  abstract readonly sortKey: number;
  abstract readonly languages: ServiceLanguages;

  protected readonly stats: ServiceStatistics = { requests: 0 };

  protected constructor(protected readonly context: ServiceContext) {}

  protected abstract get serviceOptions(): ServiceOptionSchema;

  get confspec(): ServiceOptionSchema {
    return {
      from: { type: 'string', default: this.languages.defaultFrom.code },
      into: { type: 'string', default: this.languages.defaultInto.code },
      autoswap: { type: 'boolean', default: false },
      copytoclip: { type: 'boolean', default: false },
      switchsynth: { type: 'boolean', default: false },
      ...this.serviceOptions,
    };
  }

  get statistics(): Readonly<ServiceStatistics> {
    return { ...this.stats };
  }

  abstract createTask(request: LookupTaskRequest): LookupTask;

  abstract refreshLanguages(options: ServiceOptions): Promise<number>;

  createSettingsPanel(): SettingsPanelDescriptor {
    throw new ServiceNotImplementedError(this.name, 'createSettingsPanel');
  }

  protected buildSettingsPanel(extraFields: SettingsPanelField[]): SettingsPanelDescriptor {
    return {
      title: this.summary,
      fields: [...COMMON_FIELDS, ...extraFields],
    };
  }

  protected recordResponse(headers?: Headers): void {
    this.stats.requests += 1;

    if (!headers) {
      return;
    }

    const remaining = Number.parseInt(headers.get('x-ratelimit-requests-remaining') ?? '', 10);
    const limit = Number.parseInt(headers.get('x-ratelimit-requests-limit') ?? '', 10);

    if (Number.isFinite(remaining)) {
      this.stats.remaining = remaining;
    }

    if (Number.isFinite(limit)) {
      this.stats.limit = limit;
    }
  }
}
