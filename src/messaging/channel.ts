import { EventEmitter } from 'node:events';

export type SpeechSequenceItem =
  | {
      type: 'langChange';
      lang: string;
    }
  | {
      type: 'text';
      text: string;
    };

export type AddonToHostMessage =
  | {
      type: 'speak';
      payload: {
        utteranceId: string;
        sequence: SpeechSequenceItem[];
      };
    }
  | {
      type: 'braille';
      payload: {
        text: string;
      };
    }
  | {
      type: 'message';
      payload: {
        text: string;
      };
    }
  | {
      type: 'browseableMessage';
      payload: {
        html: string;
        title: string;
      };
    }
  | {
      type: 'copyToClipboard';
      payload: {
        text: string;
      };
    }
  | {
      type: 'beep';
      payload: {
        frequency: number;
        durationMs: number;
      };
    };

export type HostToAddonMessage = {
  type: 'speechDone';
  payload: {
    utteranceId: string;
    canceled: boolean;
  };
};

export interface SpeechDoneSignal {
  utteranceId: string;
  canceled: boolean;
}

// Delivers add-on side effects to the host in post order, never synchronously.
export class HostMessageQueue {
  private readonly emitter = new EventEmitter();
  private readonly waiters = new Map<string, Array<(signal: SpeechDoneSignal) => void>>();
  private disposed = false;

  post(message: AddonToHostMessage): void {
    if (this.disposed) {
      return;
    }

    setImmediate(() => {
      this.emitter.emit('message', message);
    });
  }

  onMessage(listener: (message: AddonToHostMessage) => void): () => void {
    this.emitter.on('message', listener);
    return () => {
      this.emitter.off('message', listener);
    };
  }

  receive(message: HostToAddonMessage): void {
    switch (message.type) {
      case 'speechDone':
        this.resolve(message.payload.utteranceId, message.payload.canceled);
        break;
    }
  }

  waitForSpeechDone(utteranceId: string): Promise<SpeechDoneSignal> {
    if (this.disposed) {
      return Promise.resolve({ utteranceId, canceled: true });
    }

    return new Promise((resolve) => {
      const pending = this.waiters.get(utteranceId) ?? [];
      pending.push(resolve);
      this.waiters.set(utteranceId, pending);
    });
  }

  get pendingSpeech(): number {
    return this.waiters.size;
  }

  dispose(): void {
    this.disposed = true;

    for (const utteranceId of Array.from(this.waiters.keys())) {
      this.resolve(utteranceId, true);
    }

    this.emitter.removeAllListeners();
  }

  private resolve(utteranceId: string, canceled: boolean): void {
    const pending = this.waiters.get(utteranceId);

    if (!pending) {
      return;
    }

    this.waiters.delete(utteranceId);

    for (const resolve of pending) {
      resolve({ utteranceId, canceled });
    }
  }
}
