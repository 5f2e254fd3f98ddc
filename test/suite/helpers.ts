import { promises as fs } from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import type { AddonToHostMessage, HostMessageQueue } from '../../src/messaging/channel';
import type { FetchLike } from '../../src/services/DictionaryHttpClient';
import { LookupTask, type TaskOutput } from '../../src/services/LookupTask';
import type {
  SpeechSynthesizerHost,
  SynthesizerSettings,
} from '../../src/services/SynthesizerProfileManager';
import { ExtensionLogger, type LogChannel } from '../../src/utils/logger';

export class MemoryLogChannel implements LogChannel {
  readonly lines: string[] = [];

  appendLine(line: string): void {
    this.lines.push(line);
  }

  dispose(): void {
    // Nothing to release.
  }
}

export function createTestLogger(): { logger: ExtensionLogger; channel: MemoryLogChannel } {
  const channel = new MemoryLogChannel();
  return { logger: new ExtensionLogger(channel), channel };
}

export function flushMessages(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export function recordMessages(queue: HostMessageQueue): AddonToHostMessage[] {
  const messages: AddonToHostMessage[] = [];
  queue.onMessage((message) => messages.push(message));
  return messages;
}

export function spokenTexts(messages: AddonToHostMessage[]): string[] {
  return messages.flatMap((message) => (message.type === 'message' ? [message.payload.text] : []));
}

export interface FetchStub {
  fetch: FetchLike;
  urls: string[];
}

export function createFetchStub(respond: (url: URL, init: RequestInit) => Response | Promise<Response>): FetchStub {
  const urls: string[] = [];

  return {
    urls,
    fetch: async (url, init) => {
      urls.push(url);
      return respond(new URL(url), init);
    },
  };
}

export function jsonResponse(body: unknown, init?: ResponseInit): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
    ...init,
  });
}

// Never settles on its own; rejects once the request is aborted.
export function hangingResponse(init: RequestInit): Promise<Response> {
  return new Promise((_, reject) => {
    init.signal?.addEventListener('abort', () => {
      const error = new Error('The operation was aborted.');
      error.name = 'AbortError';
      reject(error);
    });
  });
}

export class FakeSynthesizerHost implements SpeechSynthesizerHost {
  active: string;
  readonly settings = new Map<string, SynthesizerSettings>();
  readonly failing = new Set<string>();
  readonly refused = new Set<string>();
  readonly switches: string[] = [];

  constructor(active = 'espeak', settings: Record<string, SynthesizerSettings> = {}) {
    this.active = active;

    for (const [name, values] of Object.entries(settings)) {
      this.settings.set(name, { ...values });
    }
  }

  getActiveSynthesizer(): string {
    return this.active;
  }

  getSynthesizerSettings(name: string): SynthesizerSettings {
    return { ...(this.settings.get(name) ?? {}) };
  }

  applySynthesizerSettings(name: string, settings: SynthesizerSettings): void {
    if (this.failing.has(name)) {
      throw new Error(`${name} is not available`);
    }

    this.settings.set(name, { ...settings });
  }

  setSynthesizer(name: string): boolean {
    if (this.refused.has(name)) {
      return false;
    }

    this.active = name;
    this.switches.push(name);
    return true;
  }
}

export class StubLookupTask extends LookupTask {
  executions = 0;

  constructor(
    private readonly produce: () => Promise<TaskOutput>,
    logger: ExtensionLogger,
    text = 'apple',
  ) {
    super('stub', { langFrom: 'en', langTo: 'fr', text, options: {} }, logger);
  }

  protected async execute(): Promise<TaskOutput> {
    this.executions += 1;
    return this.produce();
  }
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function createTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'lexivox-test-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}
