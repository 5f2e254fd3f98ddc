import { promises as fs } from 'node:fs';
import * as path from 'node:path';

import { ExtensionLogger } from '../utils/logger';

export type SynthesizerSettingValue = string | number | boolean;

export type SynthesizerSettings = Record<string, SynthesizerSettingValue>;

export interface SpeechSynthesizerHost {
  getActiveSynthesizer(): string;
  getSynthesizerSettings(name: string): SynthesizerSettings;
  applySynthesizerSettings(name: string, settings: SynthesizerSettings): void;
  setSynthesizer(name: string): boolean;
}

export const MIN_PROFILE_SLOT = 1;
export const MAX_PROFILE_SLOT = 9;
export const PROFILES_FORMAT_VERSION = 1;

interface StoredProfile {
  name: string;
  settings: SynthesizerSettings;
  lang: string;
}

interface StoredProfiles {
  version: number;
  profiles: Record<string, StoredProfile>;
}

export class SynthesizerProfile {
  readonly settings: Readonly<SynthesizerSettings>;

  constructor(
    readonly name = '',
    settings: SynthesizerSettings = {},
    readonly lang = '',
  ) {
    this.settings = Object.freeze({ ...settings });
    Object.freeze(this);
  }

  get title(): string {
    const voice = this.settings.voice;
    return [this.name, voice === undefined ? '' : String(voice)].join('-');
  }

  get isSet(): boolean {
    return this.name !== '';
  }

  withLanguage(lang: string): SynthesizerProfile {
    return new SynthesizerProfile(this.name, { ...this.settings }, lang);
  }

  toJSON(): StoredProfile {
    return { name: this.name, settings: { ...this.settings }, lang: this.lang };
  }
}

export function assertProfileSlot(slot: number): void {
  if (!Number.isInteger(slot) || slot < MIN_PROFILE_SLOT || slot > MAX_PROFILE_SLOT) {
    throw new RangeError(`Profile slot must be an integer from ${MIN_PROFILE_SLOT} to ${MAX_PROFILE_SLOT}.`);
  }
}

function primaryLanguage(code: string): string {
  return code.toLowerCase().split(/[-_]/)[0];
}

function isSettingValue(value: unknown): value is SynthesizerSettingValue {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

function parseStoredProfile(value: unknown): SynthesizerProfile | undefined {
  if (typeof value !== 'object' || value === null) {
    return undefined;
  }

  const name = 'name' in value && typeof value.name === 'string' ? value.name : '';
  const lang = 'lang' in value && typeof value.lang === 'string' ? value.lang : '';
  const rawSettings = 'settings' in value ? value.settings : undefined;
  const settings: SynthesizerSettings = {};

  if (typeof rawSettings === 'object' && rawSettings !== null) {
    for (const [key, item] of Object.entries(rawSettings)) {
      if (isSettingValue(item)) {
        settings[key] = item;
      }
    }
  }

  return name ? new SynthesizerProfile(name, settings, lang) : undefined;
}

export class SynthesizerProfileManager {
  private readonly profiles = new Map<number, SynthesizerProfile>();
  private defaultSnapshot: SynthesizerProfile;
  private previousSnapshot?: SynthesizerProfile;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(
    private readonly host: SpeechSynthesizerHost,
    private readonly logger: ExtensionLogger,
    private readonly filePath: string,
  ) {
    this.defaultSnapshot = this.snapshot();
  }

  static defaultPath(storagePath: string): string {
    return path.join(storagePath, 'synthesizer-profiles.json');
  }

  get hasPrevious(): boolean {
    return this.previousSnapshot !== undefined;
  }

  get(slot: number): SynthesizerProfile {
    assertProfileSlot(slot);
    return this.profiles.get(slot) ?? new SynthesizerProfile();
  }

  capture(slot: number, lang?: string): SynthesizerProfile {
    assertProfileSlot(slot);
    const existing = this.profiles.get(slot);
    const profile = this.snapshot(lang ?? existing?.lang ?? '');
    this.profiles.set(slot, profile);
    return profile;
  }

  setLanguage(slot: number, lang: string): SynthesizerProfile | undefined {
    const profile = this.get(slot);

    if (!profile.isSet) {
      return undefined;
    }

    const updated = profile.withLanguage(lang);
    this.profiles.set(slot, updated);
    return updated;
  }

  apply(slot: number): boolean {
    return this.applyProfile(this.get(slot));
  }

  remove(slot: number): SynthesizerProfile | undefined {
    assertProfileSlot(slot);
    const profile = this.profiles.get(slot);
    this.profiles.delete(slot);
    return profile;
  }

  iterate(): Array<[number, SynthesizerProfile]> {
    return Array.from(this.profiles.entries())
      .filter(([, profile]) => profile.isSet)
      .sort(([left], [right]) => left - right);
  }

  findByLanguage(lang: string): [number, SynthesizerProfile] | undefined {
    if (!lang) {
      return undefined;
    }

    const wanted = lang.toLowerCase();
    const profiles = this.iterate().filter(([, profile]) => profile.lang);

    return (
      profiles.find(([, profile]) => profile.lang.toLowerCase() === wanted) ??
      profiles.find(([, profile]) => primaryLanguage(profile.lang) === primaryLanguage(lang))
    );
  }

  rememberCurrent(profile?: SynthesizerProfile): SynthesizerProfile {
    this.previousSnapshot = profile ?? this.snapshot();
    return this.previousSnapshot;
  }

  restorePrevious(): boolean {
    const previous = this.previousSnapshot;
    this.previousSnapshot = undefined;

    if (!previous) {
      return false;
    }

    return this.applyProfile(previous);
  }

  currentAsDefault(): SynthesizerProfile {
    this.defaultSnapshot = this.snapshot();
    return this.defaultSnapshot;
  }

  restoreDefault(): SynthesizerProfile {
    this.applyProfile(this.defaultSnapshot);
    return this.defaultSnapshot;
  }

  async save(): Promise<void> {
    const container: StoredProfiles = {
      version: PROFILES_FORMAT_VERSION,
      profiles: Object.fromEntries(this.iterate().map(([slot, profile]) => [String(slot), profile.toJSON()])),
    };
    const serialized = JSON.stringify(container, undefined, 2);

    this.writeQueue = this.writeQueue
      .catch(() => undefined)
      .then(async () => {
        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
        await fs.writeFile(this.filePath, serialized, 'utf8');
      });

    try {
      await this.writeQueue;
    } catch (error) {
      this.logger.error('Failed to save synthesizer profiles.', error);
      throw error;
    }
  }

  async load(): Promise<number> {
    let raw: string;

    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        this.logger.error('Failed to read synthesizer profiles.', error);
      }
      return this.replaceProfiles(new Map());
    }

    let data: unknown;

    try {
      data = JSON.parse(raw);
    } catch (error) {
      this.logger.warn('Synthesizer profiles file is not valid JSON; starting with no profiles.');
      return this.replaceProfiles(new Map());
    }

    if (typeof data !== 'object' || data === null || !('version' in data) || typeof data.version !== 'number') {
      this.logger.warn('Synthesizer profiles file has no version; starting with no profiles.');
      return this.replaceProfiles(new Map());
    }

    const loaded = new Map<number, SynthesizerProfile>();
    const stored = 'profiles' in data ? data.profiles : undefined;

    if (typeof stored === 'object' && stored !== null) {
      for (const [key, value] of Object.entries(stored)) {
        const slot = Number(key);
        const profile = parseStoredProfile(value);

        if (Number.isInteger(slot) && slot >= MIN_PROFILE_SLOT && slot <= MAX_PROFILE_SLOT && profile) {
          loaded.set(slot, profile);
        }
      }
    }

    return this.replaceProfiles(loaded);
  }

  private replaceProfiles(profiles: Map<number, SynthesizerProfile>): number {
    this.profiles.clear();

    for (const [slot, profile] of profiles) {
      this.profiles.set(slot, profile);
    }

    return this.profiles.size;
  }

  private snapshot(lang = ''): SynthesizerProfile {
    const name = this.host.getActiveSynthesizer();
    return new SynthesizerProfile(name, { ...this.host.getSynthesizerSettings(name) }, lang);
  }

  private applyProfile(profile: SynthesizerProfile): boolean {
    if (!profile.isSet) {
      return false;
    }

    try {
      this.host.applySynthesizerSettings(profile.name, { ...profile.settings });
      return this.host.setSynthesizer(profile.name);
    } catch (error) {
      this.logger.warn(
        `Unable to apply synthesizer profile ${profile.title}: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }
}
