import { createConfigureServiceTokenCommand } from '../commands/configureServiceToken';
import { createAnnounceLanguagesCommand, createCopyLastResultCommand } from '../commands/lookupHistory';
import { type TextSource, createLookupSelectionCommand } from '../commands/lookupSelection';
import { createSwapLanguagesCommand } from '../commands/swapLanguages';
import {
  type ProfileCommandDependencies,
  ProfileSelection,
  createAnnounceSelectedSynthProfileCommand,
  createAnnounceSynthProfilesCommand,
  createRemoveSynthProfileCommand,
  createRestoreDefaultSynthCommand,
  createSaveSynthProfileCommand,
  createSelectSynthProfileCommand,
  createSetSynthProfileLanguageCommand,
} from '../commands/synthProfiles';
import { createUpdateLanguagesCommand } from '../commands/updateLanguages';
import { HostMessageQueue } from '../messaging/channel';
import { DictionaryHttpClient, type FetchLike } from '../services/DictionaryHttpClient';
import { DictionaryLookupService } from '../services/DictionaryLookupService';
import { LookupCache } from '../services/LookupCache';
import { type SecretStorage, SecretStorageService } from '../services/SecretStorageService';
import { ServiceRegistry } from '../services/ServiceRegistry';
import { SpeechDispatcher } from '../services/SpeechDispatcher';
import {
  type SpeechSynthesizerHost,
  SynthesizerProfileManager,
} from '../services/SynthesizerProfileManager';
import { SERVICE_MODULES } from '../services/dictionaries';
import type { ServiceContext } from '../types/service';
import {
  type ConfigurationStore,
  getExtensionConfiguration,
  getRequestTimeout,
  getUiLanguage,
} from '../utils/config';
import { ExtensionLogger, type LogChannel } from '../utils/logger';

const HEARTBEAT_BEEP = { frequency: 500, durationMs: 100 };

export interface AddonHost {
  textSource: TextSource;
  synthesizer: SpeechSynthesizerHost;
  secrets: SecretStorage;
  configuration: ConfigurationStore;
  storagePath: string;
  logChannel?: LogChannel;
  fetch?: FetchLike;
  createUtteranceId?: () => string;
}

export interface AddonCommands {
  announceEntry: () => Promise<void>;
  showEntry: () => Promise<void>;
  announceLanguages: () => Promise<void>;
  swapLanguages: () => Promise<void>;
  copyLastResult: () => Promise<void>;
  selectSynthProfile: (slot: number) => Promise<void>;
  announceSelectedSynthProfile: () => Promise<void>;
  announceSynthProfiles: () => Promise<void>;
  removeSynthProfile: () => Promise<void>;
  restoreDefaultSynth: () => Promise<void>;
  saveSynthProfile: (lang?: string) => Promise<void>;
  setSynthProfileLanguage: (lang: string) => Promise<void>;
  updateLanguages: () => Promise<void>;
  configureServiceToken: (serviceName: string, token: string | undefined) => Promise<void>;
}

export interface AddonContext {
  commands: AddonCommands;
  channel: HostMessageQueue;
  registry: ServiceRegistry;
  lookupService: DictionaryLookupService;
  profiles: SynthesizerProfileManager;
  logger: ExtensionLogger;
  dispose(): Promise<void>;
}

export async function registerCommands(host: AddonHost): Promise<AddonContext> {
  const logger = new ExtensionLogger(host.logChannel);
  const { configuration } = host;
  const secrets = new SecretStorageService(host.secrets, logger);
  const http = new DictionaryHttpClient(logger, host.fetch);
  const registry = new ServiceRegistry(logger);
  const channel = new HostMessageQueue();

  const serviceContext: ServiceContext = {
    http,
    secrets,
    logger,
    storagePath: host.storagePath,
    timeoutMs: getRequestTimeout(configuration),
    uiLanguage: getUiLanguage(configuration),
  };

  registry.discover(SERVICE_MODULES, serviceContext);

  await Promise.all(registry.all().map((service) => service.languages.load()));

  const config = getExtensionConfiguration(configuration, registry);
  const cache = new LookupCache(logger, {
    maxEntries: config.cacheMaxEntries,
    heartbeatIntervalMs: config.heartbeatIntervalMs,
    onHeartbeat: () => channel.post({ type: 'beep', payload: HEARTBEAT_BEEP }),
  });

  const profiles = new SynthesizerProfileManager(
    host.synthesizer,
    logger,
    SynthesizerProfileManager.defaultPath(host.storagePath),
  );
  const loadedProfiles = await profiles.load();

  const speech = new SpeechDispatcher(profiles, channel, logger, host.createUtteranceId);
  const lookupService = new DictionaryLookupService(registry, cache, speech, channel, configuration, logger);

  const profileDeps: ProfileCommandDependencies = {
    profiles,
    selection: new ProfileSelection(),
    channel,
    configuration,
    logger,
    languages: () => {
      const active = registry.get(getExtensionConfiguration(configuration, registry).activeService);

      if (!active) {
        throw new Error('No dictionary services are registered.');
      }

      return active.languages;
    },
  };

  const commands: AddonCommands = {
    announceEntry: createLookupSelectionCommand(
      host.textSource,
      lookupService,
      channel,
      configuration,
      logger,
      'speech',
    ),
    showEntry: createLookupSelectionCommand(
      host.textSource,
      lookupService,
      channel,
      configuration,
      logger,
      'browseable',
    ),
    announceLanguages: createAnnounceLanguagesCommand(lookupService, logger),
    swapLanguages: createSwapLanguagesCommand(host.textSource, lookupService, channel, configuration, logger),
    copyLastResult: createCopyLastResultCommand(lookupService, logger),
    selectSynthProfile: createSelectSynthProfileCommand(profileDeps),
    announceSelectedSynthProfile: createAnnounceSelectedSynthProfileCommand(profileDeps),
    announceSynthProfiles: createAnnounceSynthProfilesCommand(profileDeps),
    removeSynthProfile: createRemoveSynthProfileCommand(profileDeps),
    restoreDefaultSynth: createRestoreDefaultSynthCommand(profileDeps),
    saveSynthProfile: createSaveSynthProfileCommand(profileDeps),
    setSynthProfileLanguage: createSetSynthProfileLanguageCommand(profileDeps),
    updateLanguages: createUpdateLanguagesCommand(registry, channel, configuration, logger),
    configureServiceToken: createConfigureServiceTokenCommand(secrets, channel, configuration, logger),
  };

  logger.event('addon.activated', {
    services: registry.all().map((service) => service.name),
    activeService: config.activeService,
    profiles: loadedProfiles,
  });

  return {
    commands,
    channel,
    registry,
    lookupService,
    profiles,
    logger,
    dispose: async () => {
      await speech.dispose();
      cache.clear();
      logger.dispose();
    },
  };
}
