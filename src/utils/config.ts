import { promises as fs } from 'node:fs';
import * as path from 'node:path';

import type { ServiceRegistry } from '../services/ServiceRegistry';
import type {
  ExtensionConfiguration,
  ServiceOptionSchema,
  ServiceOptionValue,
  ServiceOptions,
} from '../types/config';

export interface ConfigurationStore {
  getString(key: string, defaultValue: string): string;
  getNumber(key: string, defaultValue: number): number;
  getBoolean(key: string, defaultValue: boolean): boolean;
  update(key: string, value: ServiceOptionValue | undefined): Promise<void>;
}

export const DEFAULT_SERVICE = 'yandex';

export class InMemoryConfigurationStore implements ConfigurationStore {
  protected readonly values = new Map<string, ServiceOptionValue>();

  constructor(initial?: Record<string, ServiceOptionValue>) {
    for (const [key, value] of Object.entries(initial ?? {})) {
      this.values.set(key, value);
    }
  }

  getString(key: string, defaultValue: string): string {
    const value = this.values.get(key);
    return typeof value === 'string' ? value : defaultValue;
  }

  getNumber(key: string, defaultValue: number): number {
    const value = this.values.get(key);
    return typeof value === 'number' && Number.isFinite(value) ? value : defaultValue;
  }

  getBoolean(key: string, defaultValue: boolean): boolean {
    const value = this.values.get(key);
    return typeof value === 'boolean' ? value : defaultValue;
  }

  async update(key: string, value: ServiceOptionValue | undefined): Promise<void> {
    if (value === undefined) {
      this.values.delete(key);
      return;
    }

    this.values.set(key, value);
  }

  toJSON(): Record<string, ServiceOptionValue> {
    return Object.fromEntries(this.values.entries());
  }
}

export class JsonFileConfigurationStore extends InMemoryConfigurationStore {
  private writeQueue: Promise<void> = Promise.resolve();

  private constructor(
    private readonly filePath: string,
    initial: Record<string, ServiceOptionValue>,
  ) {
    super(initial);
  }

  static async open(filePath: string): Promise<JsonFileConfigurationStore> {
    let initial: Record<string, ServiceOptionValue> = {};

    try {
      const raw = await fs.readFile(filePath, 'utf8');
      initial = parseFlatSettings(JSON.parse(raw));
    } catch (error) {
      if (!isMissingFile(error)) {
        throw error;
      }
    }

    return new JsonFileConfigurationStore(filePath, initial);
  }

  override async update(key: string, value: ServiceOptionValue | undefined): Promise<void> {
    await super.update(key, value);
    const snapshot = JSON.stringify(this.toJSON(), undefined, 2);

    this.writeQueue = this.writeQueue
      .catch(() => undefined)
      .then(async () => {
        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
        await fs.writeFile(this.filePath, snapshot, 'utf8');
      });

    await this.writeQueue;
  }
}

export function getUiLanguage(store: ConfigurationStore): string {
  return store.getString('ui.language', 'en');
}

export function getRequestTimeout(store: ConfigurationStore): number {
  return store.getNumber('network.timeoutMs', 8000);
}

export function serviceOptionKey(serviceName: string, option: string): string {
  return `services.${serviceName}.${option}`;
}

export function readServiceOptions(
  store: ConfigurationStore,
  serviceName: string,
  schema: ServiceOptionSchema,
): ServiceOptions {
  const options: ServiceOptions = {};

  for (const [option, spec] of Object.entries(schema)) {
    const key = serviceOptionKey(serviceName, option);

    switch (spec.type) {
      case 'string':
        options[option] = store.getString(key, spec.default);
        break;
      case 'number':
        options[option] = store.getNumber(key, spec.default);
        break;
      case 'boolean':
        options[option] = store.getBoolean(key, spec.default);
        break;
    }
  }

  return options;
}

export function getExtensionConfiguration(
  store: ConfigurationStore,
  registry: ServiceRegistry,
): ExtensionConfiguration {
  const configuredService = store.getString('activeService', DEFAULT_SERVICE);
  const service = registry.get(configuredService) ?? registry.lookup();

  if (!service) {
    throw new Error('No dictionary services are registered.');
  }

  const options = readServiceOptions(store, service.name, service.confspec);

  return {
    activeService: service.name,
    uiLanguage: getUiLanguage(store),
    autoLanguageSwitching: store.getBoolean('speech.autoLanguageSwitching', true),
    cacheMaxEntries: store.getNumber('cache.maxEntries', 64),
    heartbeatIntervalMs: store.getNumber('heartbeat.intervalMs', 1000),
    entryTheme: store.getString('display.theme', 'light') === 'dark' ? 'dark' : 'light',
    lookup: {
      serviceName: service.name,
      source: String(options.from ?? ''),
      target: String(options.into ?? ''),
      autoSwap: options.autoswap === true,
      copyToClipboard: options.copytoclip === true,
      switchSynthesizer: options.switchsynth === true,
      options,
    },
  };
}

function parseFlatSettings(value: unknown): Record<string, ServiceOptionValue> {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    throw new Error('Settings file must contain a JSON object.');
  }

  const settings: Record<string, ServiceOptionValue> = {};

  for (const [key, item] of Object.entries(value)) {
    if (typeof item === 'string' || typeof item === 'number' || typeof item === 'boolean') {
      settings[key] = item;
    }
  }

  return settings;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
