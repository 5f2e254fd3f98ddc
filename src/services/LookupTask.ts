import type { LookupErrorCode, LookupResult, LookupTaskState } from '../types/lookup';
import type { LookupTaskRequest } from '../types/service';
import { ExtensionLogger } from '../utils/logger';
import { escapeHtml } from '../utils/text';
import type { DictionaryProviderError } from './DictionaryHttpClient';

export interface TaskOutput {
  html: string;
  plaintext: string;
  error?: { message: string; code: LookupErrorCode };
  server?: string;
}

export abstract class LookupTask {
  private currentState: LookupTaskState = 'created';
  private completion?: Promise<LookupResult>;
  private output?: LookupResult;

  protected constructor(
    readonly serviceName: string,
    protected readonly request: LookupTaskRequest,
    protected readonly logger: ExtensionLogger,
  ) {}

  get langFrom(): string {
    return this.request.langFrom;
  }

  get langTo(): string {
    return this.request.langTo;
  }

  get text(): string {
    return this.request.text;
  }

  get state(): LookupTaskState {
    return this.currentState;
  }

  get result(): LookupResult | undefined {
    return this.output;
  }

  get plaintext(): string {
    return this.output?.plaintext ?? '';
  }

  get html(): string {
    return this.output?.html ?? '';
  }

  get error(): boolean {
    return this.output?.error ?? false;
  }

  start(): void {
    void this.ensureStarted();
  }

  isAlive(): boolean {
    return this.currentState === 'running';
  }

  join(): Promise<LookupResult> {
    return this.ensureStarted();
  }

  protected abstract execute(): Promise<TaskOutput>;

  protected serverFailure(server: string, error: DictionaryProviderError): TaskOutput {
    const message =
      server && !error.message.includes(server) ? `${error.message} [${server}]` : error.message;

    return {
      html: '',
      plaintext: '',
      error: { message: `HTTP error: ${message}`, code: error.code },
      server: server || undefined,
    };
  }

  protected serviceFailure(message: string, server: string): TaskOutput {
    return {
      html: '',
      plaintext: '',
      error: { message, code: 'invalidResponse' },
      server,
    };
  }

  private ensureStarted(): Promise<LookupResult> {
    if (!this.completion) {
      this.currentState = 'running';
      this.completion = this.run();
    }

    return this.completion;
  }

  private async run(): Promise<LookupResult> {
    const started = Date.now();
    let output: TaskOutput;

    try {
      output = await this.execute();
    } catch (error) {
      this.logger.error(`Lookup task of ${this.serviceName} failed unexpectedly.`, error);
      const message = error instanceof Error ? error.message : String(error);
      output = {
        html: '',
        plaintext: '',
        error: { message, code: 'unknown' },
      };
    }

    const result = this.freeze(output, Date.now() - started);
    this.output = result;
    this.currentState = result.error ? 'failed' : 'completed';

    this.logger.event('lookup.task', {
      service: this.serviceName,
      langFrom: this.langFrom,
      langTo: this.langTo,
      state: this.currentState,
      latencyMs: result.latencyMs,
      server: result.server,
    });

    return result;
  }

  private freeze(output: TaskOutput, latencyMs: number): LookupResult {
    const error = output.error;

    return Object.freeze({
      serviceName: this.serviceName,
      langFrom: this.langFrom,
      langTo: this.langTo,
      text: this.text,
      html: error ? `<h1>${escapeHtml(error.message)}</h1>` : output.html,
      plaintext: error ? error.message : output.plaintext,
      error: Boolean(error),
      errorCode: error?.code,
      latencyMs,
      server: output.server,
    });
  }
}

