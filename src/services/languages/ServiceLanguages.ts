import { promises as fs } from 'node:fs';
import * as path from 'node:path';

import type { LanguagePair } from '../../types/lookup';
import { ExtensionLogger } from '../../utils/logger';
import { Language } from './Language';

const MIN_CATALOG_PAIRS = 5;

export abstract class ServiceLanguages {
  private pairs: LanguagePair[] = [];
  private pairKeys = new Set<string>();

  protected constructor(
    readonly serviceName: string,
    bundled: unknown,
    private readonly storagePath: string,
    private readonly logger: ExtensionLogger,
    private readonly uiLanguage = 'en',
  ) {
    this.replace(this.parseCatalog(bundled) ?? []);
  }

  protected abstract parseCatalog(raw: unknown): LanguagePair[] | undefined;

  get filePath(): string {
    return path.join(this.storagePath, `${this.serviceName}-languages.json`);
  }

  get locale(): Language {
    return this.get(this.uiLanguage.split(/[-_]/)[0].toLowerCase());
  }

  get size(): number {
    return this.pairs.length;
  }

  async load(): Promise<boolean> {
    let raw: string;

    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        this.logger.error(`Failed to read ${this.serviceName} languages cache.`, error);
      }
      return false;
    }

    try {
      const pairs = this.parseCatalog(JSON.parse(raw));

      if (!pairs || pairs.length === 0) {
        this.logger.warn(`Ignoring unrecognised ${this.serviceName} languages cache.`);
        return false;
      }

      this.replace(pairs);
      return true;
    } catch (error) {
      this.logger.error(`Failed to parse ${this.serviceName} languages cache.`, error);
      return false;
    }
  }

  async update(raw: unknown): Promise<boolean> {
    const pairs = this.parseCatalog(raw);

    if (!pairs || pairs.length <= MIN_CATALOG_PAIRS) {
      this.logger.warn(`Received an incomplete ${this.serviceName} languages list.`);
      return false;
    }

    this.replace(pairs);
    await this.save(raw);
    this.logger.event('languages.updated', { service: this.serviceName, pairs: pairs.length });
    return true;
  }

  isAvailable(source: string, target: string): boolean {
    return this.pairKeys.has(pairKey(source, target));
  }

  get(code: string): Language {
    return new Language(code, this.uiLanguage);
  }

  fromList(): Language[] {
    return this.sortByName(unique(this.pairs.map((pair) => pair.source)));
  }

  intoList(source: string): Language[] {
    if (!source) {
      return [];
    }

    return this.sortByName(
      unique(this.pairs.filter((pair) => pair.source === source).map((pair) => pair.target)),
    );
  }

  all(): Language[] {
    return this.sortByName(unique(this.pairs.flatMap((pair) => [pair.source, pair.target])));
  }

  get defaultFrom(): Language {
    const sources = unique(this.pairs.map((pair) => pair.source));
    const code = sources.includes('en') ? 'en' : sources[0] ?? 'en';
    return this.get(code);
  }

  get defaultInto(): Language {
    const from = this.defaultFrom.code;
    const targets = this.intoList(from);
    return targets.find((language) => language.code === this.locale.code) ?? targets[0] ?? this.get(from);
  }

  private async save(raw: unknown): Promise<void> {
    try {
      await fs.mkdir(this.storagePath, { recursive: true });
      await fs.writeFile(this.filePath, JSON.stringify(raw, undefined, 2), 'utf8');
    } catch (error) {
      this.logger.error(`Failed to save ${this.serviceName} languages list.`, error);
      throw error;
    }
  }

  private replace(pairs: LanguagePair[]): void {
    this.pairs = pairs;
    this.pairKeys = new Set(pairs.map((pair) => pairKey(pair.source, pair.target)));
  }

  private sortByName(codes: string[]): Language[] {
    return codes
      .map((code) => this.get(code))
      .sort((left, right) => left.name.localeCompare(right.name, this.uiLanguage));
  }
}

function pairKey(source: string, target: string): string {
  return `${source}-${target}`;
}

function unique(values: string[]): string[] {
  return Array.from(new Set(values));
}
