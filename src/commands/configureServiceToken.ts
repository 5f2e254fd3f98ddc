import { localize } from '../i18n/localize';
import type { HostMessageQueue } from '../messaging/channel';
import { SecretStorageService } from '../services/SecretStorageService';
import { type ConfigurationStore, getUiLanguage } from '../utils/config';
import { ExtensionLogger } from '../utils/logger';

export function createConfigureServiceTokenCommand(
  secrets: SecretStorageService,
  channel: HostMessageQueue,
  configuration: ConfigurationStore,
  logger: ExtensionLogger,
): (serviceName: string, token: string | undefined) => Promise<void> {
  return async (serviceName: string, token: string | undefined) => {
    const language = getUiLanguage(configuration);
    const trimmed = token?.trim() ?? '';

    try {
      if (!trimmed) {
        await secrets.clearServiceCredential(serviceName);
        channel.post({
          type: 'message',
          payload: { text: localize('token.cleared', { service: serviceName }, { language }) },
        });
        return;
      }

      await secrets.storeServiceCredential(serviceName, trimmed);
      channel.post({
        type: 'message',
        payload: { text: localize('token.stored', { service: serviceName }, { language }) },
      });
    } catch (error) {
      logger.error('Failed to persist the service access token.', error);
      channel.post({ type: 'message', payload: { text: localize('token.failure', undefined, { language }) } });
    }
  };
}
