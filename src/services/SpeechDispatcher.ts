import { randomUUID } from 'node:crypto';

import type { HostMessageQueue, SpeechSequenceItem } from '../messaging/channel';
import { ExtensionLogger } from '../utils/logger';
import type { SynthesizerProfileManager } from './SynthesizerProfileManager';

export interface SpeechOptions {
  switchSynthesizer: boolean;
  autoLanguageSwitching: boolean;
}

export interface SpeechDelivery {
  utteranceId: string;
  switchedSynthesizer: boolean;
  // Settles once the previous synthesizer has been restored, or immediately when no switch happened.
  completed: Promise<void>;
}

export class SpeechDispatcher {
  private readonly watchers = new Set<Promise<void>>();

  constructor(
    private readonly profiles: SynthesizerProfileManager,
    private readonly channel: HostMessageQueue,
    private readonly logger: ExtensionLogger,
    private readonly createUtteranceId: () => string = randomUUID,
  ) {}

  speak(text: string, languageTag: string, options: SpeechOptions): SpeechDelivery {
    const utteranceId = this.createUtteranceId();
    const switchedSynthesizer = options.switchSynthesizer && this.switchTo(languageTag);

    const sequence: SpeechSequenceItem[] = [];

    if (options.autoLanguageSwitching && languageTag) {
      sequence.push({ type: 'langChange', lang: languageTag });
    }

    sequence.push({ type: 'text', text });

    const completed = switchedSynthesizer ? this.watch(utteranceId) : Promise.resolve();

    this.channel.post({ type: 'speak', payload: { utteranceId, sequence } });
    this.channel.post({ type: 'braille', payload: { text } });

    return { utteranceId, switchedSynthesizer, completed };
  }

  get pendingRestores(): number {
    return this.watchers.size;
  }

  async dispose(): Promise<void> {
    this.channel.dispose();
    await Promise.all(Array.from(this.watchers));
  }

  private switchTo(languageTag: string): boolean {
    const match = this.profiles.findByLanguage(languageTag);

    if (!match) {
      return false;
    }

    const [slot, profile] = match;

    if (!this.profiles.hasPrevious) {
      this.profiles.rememberCurrent();
    }

    if (this.profiles.apply(slot)) {
      this.logger.event('speech.switchSynthesizer', { slot, profile: profile.title, lang: languageTag });
      return true;
    }

    this.logger.warn(`Falling back to the previous synthesizer after profile ${slot} failed to apply.`);
    this.profiles.restorePrevious();
    return false;
  }

  private watch(utteranceId: string): Promise<void> {
    const signal = this.channel.waitForSpeechDone(utteranceId);

    const watcher = signal
      .then((done) => {
        this.logger.event('speech.done', { utteranceId, canceled: done.canceled });
      })
      .finally(() => {
        if (!this.profiles.restorePrevious()) {
          this.logger.warn(`Previous synthesizer was not restored after utterance ${utteranceId}.`);
        }
        this.watchers.delete(watcher);
      });

    this.watchers.add(watcher);
    return watcher;
  }
}
