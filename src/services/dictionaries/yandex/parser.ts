import { localize } from '../../../i18n/localize';
import type { ParsedEntry } from '../../../types/lookup';
import { renderMarkdownToHtml } from '../../../utils/markdown';
import { escapeMarkdown, htmlToPlaintext } from '../../../utils/text';

interface YandexNode {
  text?: unknown;
  pos?: unknown;
  asp?: unknown;
  num?: unknown;
  gen?: unknown;
  def?: unknown;
  tr?: unknown;
  mean?: unknown;
  syn?: unknown;
  ex?: unknown;
  error?: unknown;
}

const ATTRIBUTE_KEYS = ['pos', 'asp', 'num', 'gen'] as const;

function isNode(value: unknown): value is YandexNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function children(value: unknown): YandexNode[] {
  return Array.isArray(value) ? value.filter(isNode) : [];
}

function textOf(node: YandexNode): string {
  return typeof node.text === 'string' ? escapeMarkdown(node.text) : '';
}

function attributes(node: YandexNode, language?: string): string {
  const attrs: string[] = [];

  for (const key of ATTRIBUTE_KEYS) {
    const value = node[key];

    if (typeof value !== 'string' || !value) {
      continue;
    }

    if (key === 'num') {
      attrs.push(`*${localize('entry.number', undefined, { language })}*: ${escapeMarkdown(value)}`);
    } else if (key === 'gen') {
      attrs.push(`*${localize('entry.gender', undefined, { language })}*: ${escapeMarkdown(value)}`);
    } else {
      attrs.push(escapeMarkdown(value));
    }
  }

  return attrs.length > 0 ? ` (${attrs.join(', ')})` : '';
}

function labelled(label: string, items: string[]): string {
  return `*${label}*: ${items.join(', ')}`;
}

function renderNode(node: YandexNode, language?: string): string[] {
  const blocks: string[] = [];

  for (const definition of children(node.def)) {
    blocks.push(`# ${textOf(definition)}${attributes(definition, language)}`);
    blocks.push(...renderNode(definition, language));
  }

  const translations = children(node.tr);

  if (translations.length > 0) {
    const items = translations.map((translation) => {
      const nested = renderNode(translation, language).map((block) => indent(block));
      return [`- **${textOf(translation)}**${attributes(translation, language)}`, ...nested].join('\n\n');
    });
    blocks.push(items.join('\n'));
  }

  const meanings = children(node.mean);

  if (meanings.length > 0) {
    blocks.push(
      labelled(
        localize('entry.mean', undefined, { language }),
        meanings.map((meaning) => `${textOf(meaning)}${attributes(meaning, language)}`),
      ),
    );
  }

  const synonyms = children(node.syn);

  if (synonyms.length > 0) {
    blocks.push(
      labelled(
        localize('entry.synonyms', undefined, { language }),
        synonyms.map((synonym) => `${textOf(synonym)}${attributes(synonym, language)}`),
      ),
    );
  }

  const examples = children(node.ex);

  if (examples.length > 0) {
    const rendered = examples.map((example) => {
      const exampleTranslations = children(example.tr).map(
        (translation) => `${textOf(translation)}${attributes(translation, language)}`,
      );
      const head = `${textOf(example)}${attributes(example, language)}`;
      return exampleTranslations.length > 0 ? `${head} - ${exampleTranslations.join(', ')}` : head;
    });
    blocks.push(`*${localize('entry.examples', undefined, { language })}*: ${rendered.join('; ')}`);
  }

  return blocks;
}

function indent(block: string): string {
  return block
    .split('\n')
    .map((line) => `  ${line}`)
    .join('\n');
}

export function toMarkdown(raw: unknown, language?: string): string {
  if (!isNode(raw)) {
    return `# ${localize('entry.unrecognized', undefined, { language })}`;
  }

  const error = raw.error;

  if (typeof error === 'string' && error) {
    return `# ${escapeMarkdown(error)}`;
  }

  return renderNode(raw, language).join('\n\n');
}

export function parseYandexResponse(raw: unknown, options?: { language?: string }): ParsedEntry {
  const markdown = toMarkdown(raw, options?.language);

  if (!markdown) {
    return { html: '', plaintext: '' };
  }

  const html = renderMarkdownToHtml(markdown);
  return { html, plaintext: htmlToPlaintext(html) };
}
