import type { DictionaryHttpClient } from '../services/DictionaryHttpClient';
import type { LookupTask } from '../services/LookupTask';
import type { SecretStorageService } from '../services/SecretStorageService';
import type { ServiceLanguages } from '../services/languages/ServiceLanguages';
import type { ExtensionLogger } from '../utils/logger';
import type { ServiceOptionSchema, ServiceOptions } from './config';
import type { LookupRequest } from './lookup';

export interface LookupTaskRequest extends LookupRequest {
  options: ServiceOptions;
}

export interface ServiceStatistics {
  requests: number;
  remaining?: number;
  limit?: number;
}

export interface SettingsPanelField {
  option: string;
  label: string;
  kind: 'language' | 'checkbox' | 'choice' | 'secret';
  choices?: string[];
}

export interface SettingsPanelDescriptor {
  title: string;
  fields: SettingsPanelField[];
  status?: string;
}

export interface DictionaryService {
  readonly name: string;
  readonly summary: string;
  readonly sortKey: number;
  index: number;
  readonly confspec: ServiceOptionSchema;
  readonly languages: ServiceLanguages;
  readonly statistics: Readonly<ServiceStatistics>;
  createTask(request: LookupTaskRequest): LookupTask;
  createSettingsPanel(): SettingsPanelDescriptor;
  refreshLanguages(options: ServiceOptions): Promise<number>;
}

export interface ServiceContext {
  http: DictionaryHttpClient;
  secrets: SecretStorageService;
  logger: ExtensionLogger;
  storagePath: string;
  timeoutMs: number;
  uiLanguage: string;
}

export interface ServiceModule {
  id: string;
  register(registry: ServiceRegistrar, context: ServiceContext): void;
}

export interface ServiceRegistrar {
  add(service: DictionaryService): void;
}
