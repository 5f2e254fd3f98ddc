import { DictionaryLookupService } from '../services/DictionaryLookupService';
import { ExtensionLogger } from '../utils/logger';

export function createAnnounceLanguagesCommand(
  lookupService: DictionaryLookupService,
  logger: ExtensionLogger,
): () => Promise<void> {
  return async () => {
    try {
      lookupService.announceLanguages();
    } catch (error) {
      logger.error('Failed to announce the language pair.', error);
    }
  };
}

export function createCopyLastResultCommand(
  lookupService: DictionaryLookupService,
  logger: ExtensionLogger,
): () => Promise<void> {
  return async () => {
    try {
      lookupService.repeatLastResult();
    } catch (error) {
      logger.error('Failed to copy the last dictionary entry.', error);
    }
  };
}
