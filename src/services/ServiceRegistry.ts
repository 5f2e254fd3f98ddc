import type {
  DictionaryService,
  ServiceContext,
  ServiceModule,
  ServiceRegistrar,
} from '../types/service';
import { ExtensionLogger } from '../utils/logger';

export class ServiceRegistry implements ServiceRegistrar {
  private readonly services = new Map<string, DictionaryService>();
  private readonly discovered = new Set<string>();

  constructor(private readonly logger: ExtensionLogger) {}

  discover(modules: readonly ServiceModule[], context: ServiceContext): void {
    for (const module of modules) {
      if (this.discovered.has(module.id)) {
        continue;
      }

      module.register(this, context);
      this.discovered.add(module.id);
    }

    this.reindex();
    this.logger.event('registry.discovered', {
      services: this.all().map((service) => service.name),
    });
  }

  add(service: DictionaryService): void {
    if (this.services.has(service.name)) {
      throw new Error(`Dictionary service "${service.name}" is already registered.`);
    }

    this.services.set(service.name, service);
    this.reindex();
  }

  all(): DictionaryService[] {
    return Array.from(this.services.values()).sort(compareServices);
  }

  lookup(): DictionaryService | undefined {
    return this.all()[0];
  }

  get(name: string): DictionaryService | undefined {
    return this.services.get(name);
  }

  get size(): number {
    return this.services.size;
  }

  private reindex(): void {
    this.all().forEach((service, index) => {
      service.index = index;
    });
  }
}

function compareServices(left: DictionaryService, right: DictionaryService): number {
  if (left.sortKey !== right.sortKey) {
    return left.sortKey - right.sortKey;
  }

  return left.name.localeCompare(right.name);
}
