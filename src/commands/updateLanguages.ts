import { localize } from '../i18n/localize';
import type { HostMessageQueue } from '../messaging/channel';
import type { ServiceRegistry } from '../services/ServiceRegistry';
import { type ConfigurationStore, getExtensionConfiguration, getUiLanguage } from '../utils/config';
import { ExtensionLogger } from '../utils/logger';

export function createUpdateLanguagesCommand(
  registry: ServiceRegistry,
  channel: HostMessageQueue,
  configuration: ConfigurationStore,
  logger: ExtensionLogger,
): () => Promise<void> {
  return async () => {
    const language = getUiLanguage(configuration);

    try {
      const config = getExtensionConfiguration(configuration, registry);
      const service = registry.get(config.activeService);

      if (!service) {
        throw new Error(`Dictionary service "${config.activeService}" is not registered.`);
      }

      const count = await service.refreshLanguages(config.lookup.options);
      const text =
        count > 0
          ? localize('languages.updated', { count }, { language })
          : localize('languages.unchanged', undefined, { language });

      channel.post({ type: 'message', payload: { text } });
    } catch (error) {
      logger.error('Failed to update the languages list.', error);
      channel.post({ type: 'message', payload: { text: localize('languages.failure', undefined, { language }) } });
    }
  };
}
