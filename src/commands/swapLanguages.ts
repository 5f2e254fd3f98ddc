import { localize } from '../i18n/localize';
import type { HostMessageQueue } from '../messaging/channel';
import { DictionaryLookupService } from '../services/DictionaryLookupService';
import { type ConfigurationStore, getUiLanguage } from '../utils/config';
import { ExtensionLogger } from '../utils/logger';
import { type TextSource, readSelectedText } from './lookupSelection';

export function createSwapLanguagesCommand(
  textSource: TextSource,
  lookupService: DictionaryLookupService,
  channel: HostMessageQueue,
  configuration: ConfigurationStore,
  logger: ExtensionLogger,
): () => Promise<void> {
  return async () => {
    try {
      const swapped = await lookupService.swapLanguages();

      if (!swapped) {
        return;
      }

      const text = await readSelectedText(textSource, channel, configuration);

      if (text) {
        await lookupService.lookup(text, { presentation: 'speech' });
      }
    } catch (error) {
      logger.error('Failed to swap languages.', error);
      channel.post({
        type: 'message',
        payload: { text: localize('lookup.failure', undefined, { language: getUiLanguage(configuration) }) },
      });
    }
  };
}
