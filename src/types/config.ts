export type ServiceOptionValue = string | number | boolean;

export type ServiceOptionSpec =
  | { type: 'string'; default: string }
  | { type: 'number'; default: number }
  | { type: 'boolean'; default: boolean };

export type ServiceOptionSchema = Record<string, ServiceOptionSpec>;

export type ServiceOptions = Record<string, ServiceOptionValue>;

export interface LookupConfiguration {
  serviceName: string;
  source: string;
  target: string;
  autoSwap: boolean;
  copyToClipboard: boolean;
  switchSynthesizer: boolean;
  options: ServiceOptions;
}

export interface ExtensionConfiguration {
  activeService: string;
  uiLanguage: string;
  autoLanguageSwitching: boolean;
  cacheMaxEntries: number;
  heartbeatIntervalMs: number;
  entryTheme: 'light' | 'dark';
  lookup: LookupConfiguration;
}
