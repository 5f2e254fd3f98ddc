import MarkdownIt from 'markdown-it';
import sanitizeHtml from 'sanitize-html';

import { buildEntryStyles } from './entryStyles';
import { escapeHtml } from './text';

const markdownRenderer = new MarkdownIt({
  html: false,
  linkify: true,
  typographer: false,
});

const allowedTags = Array.from(
  new Set([...sanitizeHtml.defaults.allowedTags, 'h1', 'h2', 'h3', 'h4', 'h5', 'h6']),
);

const allowedAttributes: sanitizeHtml.IOptions['allowedAttributes'] = {
  ...sanitizeHtml.defaults.allowedAttributes,
  a: ['href', 'name', 'target', 'rel', 'title'],
};

const allowedSchemes = Array.from(new Set([...sanitizeHtml.defaults.allowedSchemes, 'mailto']));

export function renderMarkdownToHtml(markdown: string): string {
  const rendered = markdownRenderer.render(markdown);

  return sanitizeHtml(rendered, {
    allowedTags,
    allowedAttributes,
    allowedSchemes,
    transformTags: {
      a: sanitizeHtml.simpleTransform('a', {
        rel: 'noopener noreferrer',
        target: '_blank',
      }),
    },
  });
}

export function renderEntryDocument(
  body: string,
  options: { title: string; languageTag: string; theme?: 'light' | 'dark' },
): string {
  const styles = buildEntryStyles({ theme: options.theme ?? 'light' });

  return `<!DOCTYPE html>
<html lang="${escapeHtml(options.languageTag)}">
<head>
  <meta charset="UTF-8" />
  <title>${escapeHtml(options.title)}</title>
  <style>${styles}</style>
</head>
<body>
${body}
</body>
</html>`;
}
