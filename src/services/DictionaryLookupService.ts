import { localize } from '../i18n/localize';
import type { HostMessageQueue } from '../messaging/channel';
import type { ExtensionConfiguration, LookupConfiguration } from '../types/config';
import type { LanguagePair, LookupOutcome, LookupPresentation, LookupResult } from '../types/lookup';
import type { DictionaryService } from '../types/service';
import { type ConfigurationStore, getExtensionConfiguration, serviceOptionKey } from '../utils/config';
import { ExtensionLogger } from '../utils/logger';
import { renderEntryDocument } from '../utils/markdown';
import { LookupCache } from './LookupCache';
import type { ServiceRegistry } from './ServiceRegistry';
import type { SpeechDispatcher } from './SpeechDispatcher';

export interface LookupOptions {
  presentation: LookupPresentation;
}

export class DictionaryLookupService {
  private last?: LookupResult;

  constructor(
    private readonly registry: ServiceRegistry,
    private readonly cache: LookupCache,
    private readonly speech: SpeechDispatcher,
    private readonly channel: HostMessageQueue,
    private readonly configuration: ConfigurationStore,
    private readonly logger: ExtensionLogger,
  ) {}

  get lastResult(): LookupResult | undefined {
    return this.last;
  }

  async lookup(text: string, options: LookupOptions): Promise<LookupOutcome> {
    const config = this.readConfiguration();
    const service = this.activeService(config);
    const pairs = this.candidatePairs(service, config.lookup);
    const fingerprint = LookupCache.fingerprint(service.name, config.lookup.options);

    for (const pair of pairs) {
      const request = {
        langFrom: pair.source,
        langTo: pair.target,
        text,
        options: config.lookup.options,
      };
      const result = await this.cache.getOrCompute(
        { langFrom: pair.source, langTo: pair.target, text, fingerprint },
        () => service.createTask(request),
      );

      if (result.error) {
        this.logger.warn(`Lookup in ${service.name} failed: ${result.plaintext}`);
        this.message(result.plaintext);
        return { kind: 'error', result };
      }

      if (result.plaintext) {
        this.deliver(result, service, config, options.presentation);
        return { kind: 'entry', result };
      }
    }

    this.message(localize('lookup.noResults', undefined, { language: config.uiLanguage }));
    return { kind: 'noResults', pairs };
  }

  repeatLastResult(): LookupResult | undefined {
    const config = this.readConfiguration();
    const result = this.last;

    if (!result) {
      this.message(localize('lastResult.none', undefined, { language: config.uiLanguage }));
      return undefined;
    }

    const service = this.registry.get(result.serviceName) ?? this.activeService(config);
    this.channel.post({ type: 'copyToClipboard', payload: { text: result.plaintext } });
    this.message(this.describePair(service, result.langFrom, result.langTo));
    this.message(result.plaintext);
    return result;
  }

  async swapLanguages(): Promise<boolean> {
    const config = this.readConfiguration();
    const service = this.activeService(config);
    const { source, target } = config.lookup;

    if (!service.languages.isAvailable(target, source)) {
      this.message(
        `${localize('swap.unavailable', undefined, { language: config.uiLanguage })}: ${this.describePair(service, source, target)}`,
      );
      return false;
    }

    await this.configuration.update(serviceOptionKey(service.name, 'from'), target);
    await this.configuration.update(serviceOptionKey(service.name, 'into'), source);
    this.message(localize('swap.done', undefined, { language: config.uiLanguage }));
    this.message(this.describePair(service, target, source));
    this.logger.event('lookup.swapLanguages', { service: service.name, source: target, target: source });
    return true;
  }

  announceLanguages(): LanguagePair {
    const config = this.readConfiguration();
    const service = this.activeService(config);
    const { source, target } = config.lookup;

    this.message(
      localize(
        'lookup.languages',
        { from: service.languages.get(source).name, into: service.languages.get(target).name },
        { language: config.uiLanguage },
      ),
    );
    return { source, target };
  }

  private deliver(
    result: LookupResult,
    service: DictionaryService,
    config: ExtensionConfiguration,
    presentation: LookupPresentation,
  ): void {
    this.last = result;

    if (presentation === 'browseable') {
      const title = this.describePair(service, result.langFrom, result.langTo, '-');
      this.channel.post({
        type: 'browseableMessage',
        payload: {
          title,
          html: renderEntryDocument(result.html, { title, languageTag: result.langTo, theme: config.entryTheme }),
        },
      });
    } else {
      this.message(this.describePair(service, result.langFrom, result.langTo));
      this.speech.speak(result.plaintext, result.langTo, {
        switchSynthesizer: config.lookup.switchSynthesizer,
        autoLanguageSwitching: config.autoLanguageSwitching,
      });
    }

    if (config.lookup.copyToClipboard) {
      this.channel.post({ type: 'copyToClipboard', payload: { text: result.plaintext } });
    }

    this.logger.event('lookup.delivered', {
      service: result.serviceName,
      langFrom: result.langFrom,
      langTo: result.langTo,
      presentation,
      latencyMs: result.latencyMs,
    });
  }

  private candidatePairs(service: DictionaryService, lookup: LookupConfiguration): LanguagePair[] {
    const pairs: LanguagePair[] = [{ source: lookup.source, target: lookup.target }];

    if (
      lookup.autoSwap &&
      lookup.source !== lookup.target &&
      service.languages.isAvailable(lookup.target, lookup.source)
    ) {
      pairs.push({ source: lookup.target, target: lookup.source });
    }

    return pairs;
  }

  private readConfiguration(): ExtensionConfiguration {
    return getExtensionConfiguration(this.configuration, this.registry);
  }

  private activeService(config: ExtensionConfiguration): DictionaryService {
    const service = this.registry.get(config.activeService);

    if (!service) {
      throw new Error(`Dictionary service "${config.activeService}" is not registered.`);
    }

    return service;
  }

  private describePair(service: DictionaryService, from: string, into: string, separator = ' - '): string {
    return `${service.languages.get(from).name}${separator}${service.languages.get(into).name}`;
  }

  private message(text: string): void {
    this.channel.post({ type: 'message', payload: { text } });
  }
}
