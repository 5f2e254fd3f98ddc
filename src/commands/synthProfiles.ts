import { localize } from '../i18n/localize';
import type { HostMessageQueue } from '../messaging/channel';
import {
  MIN_PROFILE_SLOT,
  SynthesizerProfileManager,
  assertProfileSlot,
} from '../services/SynthesizerProfileManager';
import type { ServiceLanguages } from '../services/languages/ServiceLanguages';
import { type ConfigurationStore, getUiLanguage } from '../utils/config';
import { ExtensionLogger } from '../utils/logger';

export class ProfileSelection {
  private current = MIN_PROFILE_SLOT;

  get slot(): number {
    return this.current;
  }

  select(slot: number): void {
    assertProfileSlot(slot);
    this.current = slot;
  }

  reset(): void {
    this.current = MIN_PROFILE_SLOT;
  }
}

export interface ProfileCommandDependencies {
  profiles: SynthesizerProfileManager;
  selection: ProfileSelection;
  channel: HostMessageQueue;
  configuration: ConfigurationStore;
  logger: ExtensionLogger;
  languages: () => ServiceLanguages;
}

function announce(deps: ProfileCommandDependencies, text: string): void {
  deps.channel.post({ type: 'message', payload: { text } });
}

function language(deps: ProfileCommandDependencies): { language: string } {
  return { language: getUiLanguage(deps.configuration) };
}

function reportFailure(deps: ProfileCommandDependencies, message: string, error: unknown): void {
  deps.logger.error(message, error);
  announce(deps, localize('profiles.failure', undefined, language(deps)));
}

export function createSelectSynthProfileCommand(
  deps: ProfileCommandDependencies,
): (slot: number) => Promise<void> {
  return async (slot: number) => {
    try {
      deps.selection.select(slot);
      const profile = deps.profiles.get(slot);

      if (!profile.isSet) {
        announce(deps, localize('profiles.empty', { slot }, language(deps)));
        return;
      }

      if (!deps.profiles.apply(slot)) {
        announce(deps, localize('profiles.applyFailed', { slot }, language(deps)));
        return;
      }

      announce(deps, localize('profiles.selected', { slot, title: profile.title }, language(deps)));
    } catch (error) {
      reportFailure(deps, `Failed to select synthesizer profile ${slot}.`, error);
    }
  };
}

export function createAnnounceSelectedSynthProfileCommand(
  deps: ProfileCommandDependencies,
): () => Promise<void> {
  return async () => {
    const slot = deps.selection.slot;
    const profile = deps.profiles.get(slot);
    announce(
      deps,
      profile.isSet ? `${slot} - ${profile.title}` : localize('profiles.empty', { slot }, language(deps)),
    );
  };
}

export function createAnnounceSynthProfilesCommand(
  deps: ProfileCommandDependencies,
): () => Promise<void> {
  return async () => {
    const entries = deps.profiles.iterate();

    if (entries.length === 0) {
      announce(deps, localize('profiles.none', undefined, language(deps)));
      return;
    }

    const languages = deps.languages();
    const described = entries.map(([slot, profile]) => {
      const parts = [profile.title];

      if (profile.lang) {
        parts.push(languages.get(profile.lang).name);
      }

      return `${slot}: ${parts.join(', ')}`;
    });

    announce(deps, localize('profiles.list', { profiles: described.join('; ') }, language(deps)));
  };
}

export function createSaveSynthProfileCommand(
  deps: ProfileCommandDependencies,
): (lang?: string) => Promise<void> {
  return async (lang?: string) => {
    const slot = deps.selection.slot;

    try {
      const profile = deps.profiles.capture(slot, lang);
      await deps.profiles.save();
      announce(deps, localize('profiles.saved', { slot, title: profile.title }, language(deps)));
    } catch (error) {
      reportFailure(deps, `Failed to save synthesizer profile ${slot}.`, error);
    }
  };
}

export function createSetSynthProfileLanguageCommand(
  deps: ProfileCommandDependencies,
): (lang: string) => Promise<void> {
  return async (lang: string) => {
    const slot = deps.selection.slot;

    try {
      const profile = deps.profiles.setLanguage(slot, lang);

      if (!profile) {
        announce(deps, localize('profiles.empty', { slot }, language(deps)));
        return;
      }

      await deps.profiles.save();
      announce(
        deps,
        localize('profiles.language', { slot, language: deps.languages().get(lang).name }, language(deps)),
      );
    } catch (error) {
      reportFailure(deps, `Failed to set the language of synthesizer profile ${slot}.`, error);
    }
  };
}

export function createRemoveSynthProfileCommand(
  deps: ProfileCommandDependencies,
): () => Promise<void> {
  return async () => {
    const slot = deps.selection.slot;

    try {
      deps.profiles.remove(slot);
      deps.selection.reset();
      await deps.profiles.save();
      announce(deps, localize('profiles.removed', { slot }, language(deps)));
    } catch (error) {
      reportFailure(deps, `Failed to remove synthesizer profile ${slot}.`, error);
    }
  };
}

export function createRestoreDefaultSynthCommand(
  deps: ProfileCommandDependencies,
): () => Promise<void> {
  return async () => {
    const profile = deps.profiles.restoreDefault();
    announce(deps, localize('profiles.restored', { title: profile.title }, language(deps)));
  };
}
