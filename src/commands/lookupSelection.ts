import { localize } from '../i18n/localize';
import type { HostMessageQueue } from '../messaging/channel';
import { DictionaryLookupService } from '../services/DictionaryLookupService';
import type { LookupPresentation } from '../types/lookup';
import { type ConfigurationStore, getUiLanguage } from '../utils/config';
import { ExtensionLogger } from '../utils/logger';
import { normalizeLookupText } from '../utils/text';

export interface TextSource {
  getSelectedText(): Promise<string | undefined>;
  getClipboardText(): Promise<string | undefined>;
}

export async function readSelectedText(
  textSource: TextSource,
  channel: HostMessageQueue,
  configuration: ConfigurationStore,
): Promise<string | undefined> {
  const selected = normalizeLookupText((await textSource.getSelectedText()) ?? '');

  if (selected) {
    return selected;
  }

  const clipboard = normalizeLookupText((await textSource.getClipboardText()) ?? '');

  if (clipboard) {
    return clipboard;
  }

  channel.post({
    type: 'message',
    payload: { text: localize('lookup.noSelection', undefined, { language: getUiLanguage(configuration) }) },
  });
  return undefined;
}

export function createLookupSelectionCommand(
  textSource: TextSource,
  lookupService: DictionaryLookupService,
  channel: HostMessageQueue,
  configuration: ConfigurationStore,
  logger: ExtensionLogger,
  presentation: LookupPresentation,
): () => Promise<void> {
  return async () => {
    try {
      const text = await readSelectedText(textSource, channel, configuration);

      if (!text) {
        return;
      }

      await lookupService.lookup(text, { presentation });
    } catch (error) {
      logger.error('Failed to look up the selected text.', error);
      channel.post({
        type: 'message',
        payload: { text: localize('lookup.failure', undefined, { language: getUiLanguage(configuration) }) },
      });
    }
  };
}
