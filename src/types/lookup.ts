export type LookupErrorCode =
  | 'authentication'
  | 'timeout'
  | 'rateLimit'
  | 'network'
  | 'server'
  | 'invalidResponse'
  | 'configuration'
  | 'unknown';

export interface LanguagePair {
  source: string;
  target: string;
}

export interface ParsedEntry {
  html: string;
  plaintext: string;
}

export interface LookupRequest {
  langFrom: string;
  langTo: string;
  text: string;
}

export interface LookupResult {
  readonly serviceName: string;
  readonly langFrom: string;
  readonly langTo: string;
  readonly text: string;
  readonly plaintext: string;
  readonly html: string;
  readonly error: boolean;
  readonly errorCode?: LookupErrorCode;
  readonly latencyMs: number;
  readonly server?: string;
}

export type LookupTaskState = 'created' | 'running' | 'completed' | 'failed';

export type LookupPresentation = 'speech' | 'browseable';

export type LookupOutcome =
  | {
      kind: 'entry';
      result: LookupResult;
    }
  | {
      kind: 'noResults';
      pairs: LanguagePair[];
    }
  | {
      kind: 'error';
      result: LookupResult;
    };
