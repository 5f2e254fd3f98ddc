import { type AddonContext, type AddonHost, registerCommands } from './activation/registerCommands';

export type { AddonCommands, AddonContext, AddonHost } from './activation/registerCommands';
export type { AddonToHostMessage, HostToAddonMessage, SpeechSequenceItem } from './messaging/channel';
export type { SpeechSynthesizerHost, SynthesizerSettings } from './services/SynthesizerProfileManager';
export type { SecretStorage } from './services/SecretStorageService';
export type { ConfigurationStore } from './utils/config';
export { InMemoryConfigurationStore, JsonFileConfigurationStore } from './utils/config';
export { InMemorySecretStorage } from './services/SecretStorageService';

let current: AddonContext | undefined;

export async function activate(host: AddonHost): Promise<AddonContext> {
  if (current) {
    await current.dispose();
  }

  current = await registerCommands(host);
  return current;
}

export async function deactivate(): Promise<void> {
  const context = current;
  current = undefined;

  if (context) {
    await context.dispose();
  }
}
