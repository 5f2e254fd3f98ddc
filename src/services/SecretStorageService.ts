import { ExtensionLogger } from '../utils/logger';

export interface SecretStorage {
  get(key: string): Promise<string | undefined>;
  store(key: string, value: string): Promise<void>;
  delete(key: string): Promise<void>;
}

export class InMemorySecretStorage implements SecretStorage {
  private readonly storageMap = new Map<string, string>();

  async get(key: string): Promise<string | undefined> {
    return this.storageMap.get(key);
  }

  async store(key: string, value: string): Promise<void> {
    this.storageMap.set(key, value);
  }

  async delete(key: string): Promise<void> {
    this.storageMap.delete(key);
  }
}

function secretKey(serviceName: string, field: string): string {
  return `lexivox.${serviceName}.${field}`;
}

export class SecretStorageService {
  constructor(
    private readonly secretStorage: SecretStorage,
    private readonly logger: ExtensionLogger,
  ) {}

  async getServiceCredential(serviceName: string, field = 'token'): Promise<string | undefined> {
    try {
      const value = await this.secretStorage.get(secretKey(serviceName, field));
      return value?.trim() || undefined;
    } catch (error) {
      this.logger.error(`Failed to retrieve ${serviceName} ${field} from secret storage.`, error);
      return undefined;
    }
  }

  async storeServiceCredential(serviceName: string, value: string, field = 'token'): Promise<void> {
    try {
      await this.secretStorage.store(secretKey(serviceName, field), value.trim());
      this.logger.info(`Stored ${serviceName} ${field} in secret storage.`);
    } catch (error) {
      this.logger.error(`Failed to store ${serviceName} ${field} in secret storage.`, error);
      throw error;
    }
  }

  async clearServiceCredential(serviceName: string, field = 'token'): Promise<void> {
    try {
      await this.secretStorage.delete(secretKey(serviceName, field));
      this.logger.info(`Cleared ${serviceName} ${field} from secret storage.`);
    } catch (error) {
      this.logger.error(`Failed to clear ${serviceName} ${field} from secret storage.`, error);
      throw error;
    }
  }
}
