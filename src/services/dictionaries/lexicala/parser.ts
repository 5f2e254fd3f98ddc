import { localize } from '../../../i18n/localize';
import type { ParsedEntry } from '../../../types/lookup';
import { renderMarkdownToHtml } from '../../../utils/markdown';
import { escapeMarkdown, htmlToPlaintext } from '../../../utils/text';

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asList(value: unknown): JsonRecord[] {
  if (Array.isArray(value)) {
    return value.filter(isRecord);
  }

  return isRecord(value) ? [value] : [];
}

function stringField(record: JsonRecord, key: string): string {
  const value = record[key];
  return typeof value === 'string' ? value.trim() : '';
}

function renderHeadword(headword: JsonRecord): string {
  const text = escapeMarkdown(stringField(headword, 'text'));
  const details: string[] = [];
  const pos = headword.pos;

  if (typeof pos === 'string' && pos) {
    details.push(escapeMarkdown(pos));
  } else if (Array.isArray(pos)) {
    details.push(...pos.filter((item): item is string => typeof item === 'string').map(escapeMarkdown));
  }

  const pronunciations = asList(headword.pronunciation)
    .map((pronunciation) => stringField(pronunciation, 'value'))
    .filter(Boolean);
  const suffix = details.length > 0 ? ` (${details.join(', ')})` : '';
  const transcription = pronunciations.length > 0 ? ` [${pronunciations.map(escapeMarkdown).join(', ')}]` : '';

  return `# ${text}${suffix}${transcription}`;
}

function translationsInto(record: JsonRecord, target: string): string[] {
  const translations = record.translations;

  if (!isRecord(translations)) {
    return [];
  }

  return asList(translations[target])
    .map((translation) => stringField(translation, 'text'))
    .filter(Boolean)
    .map(escapeMarkdown);
}

function renderSense(sense: JsonRecord, target: string, language?: string): string | undefined {
  const translated = translationsInto(sense, target);
  const definition = escapeMarkdown(stringField(sense, 'definition'));
  let head: string;

  if (translated.length > 0) {
    head = `- **${translated.join(', ')}**${definition ? `: ${definition}` : ''}`;
  } else if (definition) {
    head = `- ${definition}`;
  } else {
    return undefined;
  }

  const examples = asList(sense.examples)
    .map((example) => {
      const text = escapeMarkdown(stringField(example, 'text'));
      const exampleTranslations = translationsInto(example, target);
      return exampleTranslations.length > 0 ? `${text} - ${exampleTranslations.join(', ')}` : text;
    })
    .filter(Boolean);

  if (examples.length === 0) {
    return head;
  }

  return `${head}\n\n  *${localize('entry.examples', undefined, { language })}*: ${examples.join('; ')}`;
}

export function toMarkdown(raw: unknown, target: string, language?: string): string {
  if (!isRecord(raw)) {
    return `# ${localize('entry.unrecognized', undefined, { language })}`;
  }

  const error = stringField(raw, 'error') || stringField(raw, 'message');

  if (error && !Array.isArray(raw.results)) {
    return `# ${escapeMarkdown(error)}`;
  }

  const blocks: string[] = [];

  for (const result of asList(raw.results)) {
    const senses = asList(result.senses)
      .map((sense) => renderSense(sense, target, language))
      .filter((sense): sense is string => Boolean(sense));

    if (senses.length === 0) {
      continue;
    }

    for (const headword of asList(result.headword)) {
      blocks.push(renderHeadword(headword));
    }

    blocks.push(senses.join('\n'));
  }

  return blocks.join('\n\n');
}

export function parseLexicalaResponse(
  raw: unknown,
  options: { target: string; language?: string },
): ParsedEntry {
  const markdown = toMarkdown(raw, options.target, options.language);

  if (!markdown) {
    return { html: '', plaintext: '' };
  }

  const html = renderMarkdownToHtml(markdown);
  return { html, plaintext: htmlToPlaintext(html) };
}
