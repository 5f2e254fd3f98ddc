type EntryStyleOptions = {
  theme: 'light' | 'dark';
};

export function buildEntryStyles(options: EntryStyleOptions): string {
  const { theme } = options;
  const background = theme === 'dark' ? '#1e1e1e' : '#ffffff';
  const foreground = theme === 'dark' ? '#d4d4d4' : '#1f2933';
  const subtle = theme === 'dark' ? '#9ca3af' : '#4b5563';
  const accent = theme === 'dark' ? '#93c5fd' : '#1d4ed8';

  return `
    :root {
      color-scheme: ${theme};
    }

    body {
      background: ${background};
      color: ${foreground};
      font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', sans-serif;
      margin: 0;
      padding: 16px;
      line-height: 1.5;
    }

    h1 {
      font-size: 1.4rem;
      margin: 0.8em 0 0.4em;
    }

    ul {
      padding-left: 1.4em;
    }

    li > p {
      margin: 0.2em 0;
    }

    em {
      color: ${subtle};
    }

    strong {
      color: ${accent};
    }
  `;
}
