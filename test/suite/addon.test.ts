import * as assert from 'assert';
import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { suite, test } from 'mocha';

import type { TextSource } from '../../src/commands/lookupSelection';
import {
  type AddonContext,
  type AddonToHostMessage,
  InMemoryConfigurationStore,
  InMemorySecretStorage,
  activate,
  deactivate,
} from '../../src/extension';
import type { ServiceOptionValue } from '../../src/types/config';
import {
  FakeSynthesizerHost,
  createFetchStub,
  createTempDir,
  delay,
  flushMessages,
  jsonResponse,
  recordMessages,
  removeTempDir,
  spokenTexts,
} from './helpers';

const APPLE_ENTRY = {
  def: [
    {
      text: 'apple',
      pos: 'noun',
      tr: [
        {
          text: 'pomme',
          pos: 'noun',
          gen: 'f',
          syn: [{ text: 'pommier', pos: 'noun' }],
          mean: [{ text: 'apple' }],
          ex: [{ text: 'apple pie', tr: [{ text: 'tarte aux pommes' }] }],
        },
      ],
    },
  ],
};

const APPLE_TEXT = [
  '# apple (noun)',
  '• pomme (noun, gender: f)',
  'Mean: apple',
  'Synonyms: pommier (noun)',
  'Examples: apple pie - tarte aux pommes',
].join('\n');

const POTATO_ENTRY = {
  def: [{ text: 'Kartoffel', pos: 'noun', tr: [{ text: 'potato', pos: 'noun' }] }],
};

const POTATO_TEXT = '# Kartoffel (noun)\n• potato (noun)';

const NO_SELECTION =
  'There is no selected text, the clipboard is also empty, or its content is not text!';

interface AddonOptions {
  settings?: Record<string, ServiceOptionValue>;
  token?: string;
  files?: Record<string, unknown>;
  respond?: (url: URL, init: RequestInit) => Response | Promise<Response>;
}

class StubTextSource implements TextSource {
  selection: string | undefined = 'apple';
  clipboard: string | undefined;

  async getSelectedText(): Promise<string | undefined> {
    return this.selection;
  }

  async getClipboardText(): Promise<string | undefined> {
    return this.clipboard;
  }
}

function respondWithDictionary(url: URL): Response {
  const lang = url.searchParams.get('lang');
  const text = url.searchParams.get('text');

  if (lang === 'en-fr' && text === 'apple') {
    return jsonResponse(APPLE_ENTRY);
  }

  if (lang === 'de-en' && text === 'Kartoffel') {
    return jsonResponse(POTATO_ENTRY);
  }

  return jsonResponse({ head: {}, def: [] });
}

suite('Dictionary add-on', () => {
  let storagePath: string;

  setup(async () => {
    storagePath = await createTempDir();
  });

  teardown(async () => {
    await deactivate();
    await removeTempDir(storagePath);
  });

  async function createAddon(options: AddonOptions = {}) {
    for (const [name, content] of Object.entries(options.files ?? {})) {
      await fs.writeFile(path.join(storagePath, name), JSON.stringify(content), 'utf8');
    }

    const secrets = new InMemorySecretStorage();

    if (options.token !== '') {
      await secrets.store('lexivox.yandex.token', options.token ?? 'test-secret');
      await secrets.store('lexivox.lexicala.token', options.token ?? 'test-secret');
    }

    const configuration = new InMemoryConfigurationStore({
      'services.yandex.from': 'en',
      'services.yandex.into': 'fr',
      ...options.settings,
    });
    const textSource = new StubTextSource();
    const synthesizer = new FakeSynthesizerHost('espeak', {
      espeak: { voice: 'en', rate: 50 },
      oneCore: { voice: 'Hortense', rate: 40 },
    });
    const stub = createFetchStub(options.respond ?? respondWithDictionary);
    let utterances = 0;

    const context: AddonContext = await activate({
      textSource,
      synthesizer,
      secrets,
      configuration,
      storagePath,
      logChannel: { appendLine: () => undefined, dispose: () => undefined },
      fetch: stub.fetch,
      createUtteranceId: () => `utt-${(utterances += 1)}`,
    });
    const messages: AddonToHostMessage[] = recordMessages(context.channel);

    return { context, configuration, textSource, synthesizer, stub, messages };
  }

  test('announces and speaks an entry and serves the repeat from the cache', async () => {
    const { context, stub, messages } = await createAddon();

    await context.commands.announceEntry();
    await flushMessages();

    assert.deepStrictEqual(stub.urls, [
      'https://dictionary.yandex.net/api/v1/dicservice.json/lookup?key=test-secret&lang=en-fr&text=apple&ui=fr',
    ]);
    assert.deepStrictEqual(messages, [
      { type: 'message', payload: { text: 'English - French' } },
      {
        type: 'speak',
        payload: {
          utteranceId: 'utt-1',
          sequence: [
            { type: 'langChange', lang: 'fr' },
            { type: 'text', text: APPLE_TEXT },
          ],
        },
      },
      { type: 'braille', payload: { text: APPLE_TEXT } },
    ]);

    await context.commands.announceEntry();

    assert.strictEqual(stub.urls.length, 1);
    assert.strictEqual(context.lookupService.lastResult?.plaintext, APPLE_TEXT);
  });

  test('tries the reversed pair when auto-swap is on', async () => {
    const { context, stub, messages } = await createAddon({
      settings: { 'services.yandex.into': 'de', 'services.yandex.autoswap': true },
    });

    const outcome = await context.lookupService.lookup('Kartoffel', { presentation: 'speech' });
    await flushMessages();

    assert.strictEqual(outcome.kind, 'entry');
    assert.strictEqual(outcome.kind === 'entry' ? outcome.result.langFrom : undefined, 'de');
    assert.strictEqual(outcome.kind === 'entry' ? outcome.result.plaintext : undefined, POTATO_TEXT);
    assert.deepStrictEqual(
      stub.urls.map((url) => new URL(url).searchParams.get('lang')),
      ['en-de', 'de-en'],
    );
    assert.deepStrictEqual(spokenTexts(messages), ['German - English']);
  });

  test('skips the reversed pair when the service does not offer it', async () => {
    const { context, stub, messages } = await createAddon({
      settings: { 'services.yandex.into': 'uk', 'services.yandex.autoswap': true },
      files: { 'yandex-languages.json': ['en-fr', 'fr-en', 'en-de', 'de-en', 'en-uk'] },
    });

    const outcome = await context.lookupService.lookup('apple', { presentation: 'speech' });
    await flushMessages();

    assert.deepStrictEqual(outcome, { kind: 'noResults', pairs: [{ source: 'en', target: 'uk' }] });
    assert.strictEqual(stub.urls.length, 1);
    assert.deepStrictEqual(spokenTexts(messages), ['No results']);
    assert.strictEqual(context.lookupService.lastResult, undefined);
  });

  test('announces a failure after every server rejected the request', async () => {
    const { context, stub, messages } = await createAddon({
      respond: () => new Response('', { status: 401 }),
    });

    const outcome = await context.lookupService.lookup('apple', { presentation: 'speech' });
    await flushMessages();

    assert.strictEqual(outcome.kind, 'error');
    assert.strictEqual(outcome.kind === 'error' ? outcome.result.errorCode : undefined, 'authentication');
    assert.strictEqual(stub.urls.length, 2);
    assert.deepStrictEqual(spokenTexts(messages), [
      'HTTP error: Incorrect response code 401 from the server https://info.alwaysdata.net',
    ]);
    assert.strictEqual(context.lookupService.lastResult, undefined);
  });

  test('treats an error body from the dictionary as a failed lookup', async () => {
    let blocked = true;
    const { context, stub, messages } = await createAddon({
      respond: (url) => (blocked ? jsonResponse({ error: 'Key blocked' }) : respondWithDictionary(url)),
    });

    const outcome = await context.lookupService.lookup('apple', { presentation: 'speech' });
    await flushMessages();

    assert.strictEqual(outcome.kind, 'error');
    assert.strictEqual(outcome.kind === 'error' ? outcome.result.errorCode : undefined, 'invalidResponse');
    assert.strictEqual(stub.urls.length, 1);
    assert.deepStrictEqual(spokenTexts(messages), ['Key blocked']);
    assert.strictEqual(context.lookupService.lastResult, undefined);

    blocked = false;
    const retried = await context.lookupService.lookup('apple', { presentation: 'speech' });

    assert.strictEqual(retried.kind, 'entry');
    assert.strictEqual(stub.urls.length, 2);
  });

  test('moves on to the mirror when a server answers with an unexpected body', async () => {
    const { context, stub } = await createAddon({
      respond: (url) => (url.hostname === 'dictionary.yandex.net' ? jsonResponse({ foo: 1 }) : respondWithDictionary(url)),
    });

    const outcome = await context.lookupService.lookup('apple', { presentation: 'speech' });

    assert.strictEqual(outcome.kind, 'entry');
    assert.strictEqual(outcome.kind === 'entry' ? outcome.result.server : undefined, 'https://info.alwaysdata.net');
    assert.strictEqual(outcome.kind === 'entry' ? outcome.result.plaintext : undefined, APPLE_TEXT);
    assert.strictEqual(stub.urls.length, 2);
  });

  test('forgets cached entries after a failed lookup', async () => {
    let failing = false;
    const { context, stub } = await createAddon({
      respond: (url) => (failing ? new Response('', { status: 503 }) : respondWithDictionary(url)),
    });

    await context.lookupService.lookup('apple', { presentation: 'speech' });
    failing = true;
    await context.lookupService.lookup('pear', { presentation: 'speech' });
    failing = false;
    await context.lookupService.lookup('apple', { presentation: 'speech' });

    assert.strictEqual(stub.urls.length, 4);
  });

  test('reports a missing token without contacting the service', async () => {
    const { context, stub, messages } = await createAddon({ token: '' });

    const outcome = await context.lookupService.lookup('apple', { presentation: 'speech' });
    await flushMessages();

    assert.strictEqual(outcome.kind === 'error' ? outcome.result.errorCode : undefined, 'configuration');
    assert.deepStrictEqual(stub.urls, []);
    assert.deepStrictEqual(spokenTexts(messages), ['Access token for yandex is not set.']);
  });

  test('shows the entry as a browseable document', async () => {
    const { context, messages } = await createAddon();

    await context.commands.showEntry();
    await flushMessages();

    assert.strictEqual(messages.length, 1);
    const [message] = messages;
    assert.strictEqual(message.type, 'browseableMessage');

    if (message.type === 'browseableMessage') {
      assert.strictEqual(message.payload.title, 'English-French');
      assert.ok(message.payload.html.startsWith('<!DOCTYPE html>\n<html lang="fr">'));
      assert.ok(message.payload.html.includes('<title>English-French</title>'));
      assert.ok(message.payload.html.includes('<h1>apple (noun)</h1>'));
    }
  });

  test('styles the browseable document with the configured theme', async () => {
    const { context, messages } = await createAddon({ settings: { 'display.theme': 'dark' } });

    await context.commands.showEntry();
    await flushMessages();

    const [message] = messages;
    assert.strictEqual(message.type, 'browseableMessage');
    assert.ok(message.type === 'browseableMessage' && message.payload.html.includes('color-scheme: dark;'));
  });

  test('copies the entry when copying to the clipboard is enabled', async () => {
    const { context, messages } = await createAddon({ settings: { 'services.yandex.copytoclip': true } });

    await context.commands.announceEntry();
    await flushMessages();

    assert.deepStrictEqual(
      messages.map((message) => message.type),
      ['message', 'speak', 'braille', 'copyToClipboard'],
    );
    assert.deepStrictEqual(messages[3], { type: 'copyToClipboard', payload: { text: APPLE_TEXT } });
  });

  test('beeps while waiting for a slow dictionary', async () => {
    const { context, messages } = await createAddon({
      settings: { 'heartbeat.intervalMs': 20 },
      respond: async (url) => {
        await delay(70);
        return respondWithDictionary(url);
      },
    });

    await context.commands.announceEntry();
    await flushMessages();

    assert.deepStrictEqual(messages[0], { type: 'beep', payload: { frequency: 500, durationMs: 100 } });
    assert.deepStrictEqual(spokenTexts(messages), ['English - French']);
  });

  test('falls back to the clipboard and warns when there is nothing to look up', async () => {
    const { context, textSource, stub, messages } = await createAddon();
    textSource.selection = '  ';
    textSource.clipboard = '42!';

    await context.commands.announceEntry();
    await flushMessages();

    assert.deepStrictEqual(spokenTexts(messages), [NO_SELECTION]);
    assert.deepStrictEqual(stub.urls, []);

    textSource.clipboard = 'apple?';
    await context.commands.announceEntry();

    assert.strictEqual(new URL(stub.urls[0]).searchParams.get('text'), 'apple');
  });

  test('swaps the language pair and looks up the selection again', async () => {
    const { context, configuration, textSource, messages } = await createAddon();
    textSource.selection = undefined;

    await context.commands.swapLanguages();
    await flushMessages();

    assert.strictEqual(configuration.getString('services.yandex.from', ''), 'fr');
    assert.strictEqual(configuration.getString('services.yandex.into', ''), 'en');
    assert.deepStrictEqual(spokenTexts(messages), ['Languages swapped', 'French - English', NO_SELECTION]);
  });

  test('refuses to swap into a pair the service does not offer', async () => {
    const { context, configuration, messages } = await createAddon({
      settings: { 'services.yandex.into': 'uk' },
      files: { 'yandex-languages.json': ['en-fr', 'fr-en', 'en-de', 'de-en', 'en-uk'] },
    });

    await context.commands.swapLanguages();
    await flushMessages();

    assert.strictEqual(configuration.getString('services.yandex.from', ''), 'en');
    assert.deepStrictEqual(spokenTexts(messages), [
      'Swap languages is not available for this pair: English - Ukrainian',
    ]);
  });

  test('repeats and copies the last entry', async () => {
    const { context, messages } = await createAddon();

    await context.commands.copyLastResult();
    await context.commands.announceEntry();
    await context.commands.announceLanguages();
    await flushMessages();
    messages.splice(0, 4);

    await context.commands.copyLastResult();
    await flushMessages();

    assert.deepStrictEqual(messages, [
      { type: 'message', payload: { text: 'Translate: from English to French' } },
      { type: 'copyToClipboard', payload: { text: APPLE_TEXT } },
      { type: 'message', payload: { text: 'English - French' } },
      { type: 'message', payload: { text: APPLE_TEXT } },
    ]);
  });

  test('switches to the voice saved for the target language while speaking', async () => {
    const { context, synthesizer } = await createAddon({
      settings: { 'services.yandex.switchsynth': true },
      files: {
        'synthesizer-profiles.json': {
          version: 1,
          profiles: { '1': { name: 'oneCore', settings: { voice: 'Hortense', rate: 40 }, lang: 'fr' } },
        },
      },
    });

    await context.commands.announceEntry();

    assert.strictEqual(synthesizer.active, 'oneCore');

    context.channel.receive({ type: 'speechDone', payload: { utteranceId: 'utt-1', canceled: false } });
    await flushMessages();

    assert.strictEqual(synthesizer.active, 'espeak');
  });

  test('refreshes the languages list of the active service', async () => {
    const catalog = ['en-fr', 'fr-en', 'en-de', 'de-en', 'en-es', 'es-en'];
    const { context, messages } = await createAddon({
      respond: (url) => (url.pathname.endsWith('/getLangs') ? jsonResponse(catalog) : jsonResponse({})),
    });

    await context.commands.updateLanguages();
    await flushMessages();

    assert.deepStrictEqual(spokenTexts(messages), ['Languages list updated: 6 language pairs']);
    assert.deepStrictEqual(
      JSON.parse(await fs.readFile(path.join(storagePath, 'yandex-languages.json'), 'utf8')),
      catalog,
    );
    assert.strictEqual(context.registry.get('yandex')?.languages.isAvailable('en', 'ru'), false);
  });

  test('announces when the languages list cannot be refreshed', async () => {
    const { context, stub, messages } = await createAddon({ token: '' });

    await context.commands.updateLanguages();
    await flushMessages();

    assert.deepStrictEqual(stub.urls, []);
    assert.deepStrictEqual(spokenTexts(messages), ['Unable to update the languages list. Check logs.']);
  });

  test('stores and clears the service token', async () => {
    const { context, stub, messages } = await createAddon({ token: '' });

    await context.commands.configureServiceToken('yandex', ' test-secret ');
    await context.lookupService.lookup('apple', { presentation: 'speech' });
    await context.commands.configureServiceToken('yandex', undefined);
    await flushMessages();

    assert.strictEqual(new URL(stub.urls[0]).searchParams.get('key'), 'test-secret');
    assert.deepStrictEqual(spokenTexts(messages), [
      'Access token for yandex stored.',
      'English - French',
      'Access token for yandex cleared.',
    ]);
  });

  test('manages synthesizer profiles through commands', async () => {
    const { context, synthesizer, messages } = await createAddon();

    await context.commands.selectSynthProfile(2);
    await context.commands.saveSynthProfile('fr');
    await context.commands.announceSynthProfiles();
    await context.commands.setSynthProfileLanguage('de');
    await context.commands.announceSelectedSynthProfile();
    synthesizer.active = 'oneCore';
    await context.commands.selectSynthProfile(2);
    await context.commands.removeSynthProfile();
    await context.commands.announceSynthProfiles();
    await context.commands.announceSelectedSynthProfile();
    await context.commands.restoreDefaultSynth();
    await context.commands.selectSynthProfile(12);
    await flushMessages();

    assert.deepStrictEqual(spokenTexts(messages), [
      'Profile 2 is empty',
      'Profile 2 saved: espeak-en',
      'Saved profiles: 2: espeak-en, French',
      'Profile 2 language: German',
      '2 - espeak-en',
      'Profile 2 selected: espeak-en',
      'Profile 2 removed',
      'There are no saved profiles',
      'Profile 1 is empty',
      'Default voice restored: espeak-en',
      'Unable to update synthesizer profiles. Check logs.',
    ]);
    assert.strictEqual(synthesizer.active, 'espeak');
    assert.deepStrictEqual(
      JSON.parse(await fs.readFile(path.join(storagePath, 'synthesizer-profiles.json'), 'utf8')),
      { version: 1, profiles: {} },
    );
  });

  suite('with Lexicala', () => {
    const LEXICALA_SETTINGS = {
      activeService: 'lexicala',
      'services.lexicala.from': 'en',
      'services.lexicala.into': 'fr',
      'services.lexicala.morph': true,
    };

    const APPLE_RESULTS = {
      n_results: 1,
      results: [
        {
          headword: { text: 'apple', pos: 'noun' },
          senses: [{ definition: 'a round fruit', translations: { fr: { text: 'pomme' } } }],
        },
      ],
    };

    test('searches with the RapidAPI key and reports the remaining quota', async () => {
      const requestHeaders: Headers[] = [];
      const { context, stub, messages } = await createAddon({
        settings: LEXICALA_SETTINGS,
        respond: (_url, init) => {
          requestHeaders.push(new Headers(init.headers));
          return jsonResponse(APPLE_RESULTS, {
            headers: {
              'Content-Type': 'application/json',
              'x-ratelimit-requests-remaining': '95',
              'x-ratelimit-requests-limit': '100',
            },
          });
        },
      });

      await context.commands.announceEntry();
      await flushMessages();

      assert.deepStrictEqual(stub.urls, [
        'https://lexicala1.p.rapidapi.com/search?source=global&language=en&text=apple&morph=true&analyzed=false',
      ]);
      assert.strictEqual(requestHeaders[0].get('X-RapidAPI-Key'), 'test-secret');
      assert.strictEqual(requestHeaders[0].get('X-RapidAPI-Host'), 'lexicala1.p.rapidapi.com');
      assert.deepStrictEqual(spokenTexts(messages), ['English - French']);
      assert.strictEqual(context.lookupService.lastResult?.plaintext, '# apple (noun)\n• pomme: a round fruit');

      const service = context.registry.get('lexicala');
      assert.deepStrictEqual(service?.statistics, { requests: 1, remaining: 95, limit: 100 });
      assert.strictEqual(service?.createSettingsPanel().status, 'Requests remaining: 95 of 100');
    });

    test('leaves the quota out of the settings panel until the service reports it', async () => {
      const { context } = await createAddon({ settings: LEXICALA_SETTINGS });

      assert.strictEqual(context.registry.get('lexicala')?.createSettingsPanel().status, undefined);
    });

    test('reports a missing RapidAPI key without contacting the service', async () => {
      const { context, stub, messages } = await createAddon({ settings: LEXICALA_SETTINGS, token: '' });

      const outcome = await context.lookupService.lookup('apple', { presentation: 'speech' });
      await flushMessages();

      assert.strictEqual(outcome.kind === 'error' ? outcome.result.errorCode : undefined, 'configuration');
      assert.deepStrictEqual(stub.urls, []);
      assert.deepStrictEqual(spokenTexts(messages), ['Access token for lexicala is not set.']);
    });

    test('announces a refused subscription as a failure', async () => {
      const { context, messages } = await createAddon({
        settings: LEXICALA_SETTINGS,
        respond: () => jsonResponse({ message: 'You are not subscribed to this API.' }),
      });

      const outcome = await context.lookupService.lookup('apple', { presentation: 'speech' });
      await flushMessages();

      assert.strictEqual(outcome.kind === 'error' ? outcome.result.errorCode : undefined, 'invalidResponse');
      assert.deepStrictEqual(spokenTexts(messages), ['You are not subscribed to this API.']);
    });

    test('refreshes the languages list from every resource', async () => {
      const catalog = {
        resources: {
          global: { source_languages: ['en', 'de'], target_languages: ['fr', 'en'] },
          password: { source_languages: ['es'], target_languages: ['de'] },
        },
      };
      const { context, stub, messages } = await createAddon({
        settings: LEXICALA_SETTINGS,
        respond: () => jsonResponse(catalog),
      });

      await context.commands.updateLanguages();
      await flushMessages();

      assert.deepStrictEqual(stub.urls, ['https://lexicala1.p.rapidapi.com/languages']);
      assert.deepStrictEqual(spokenTexts(messages), ['Languages list updated: 7 language pairs']);
      assert.deepStrictEqual(
        JSON.parse(await fs.readFile(path.join(storagePath, 'lexicala-languages.json'), 'utf8')),
        catalog,
      );

      const languages = context.registry.get('lexicala')?.languages;
      assert.strictEqual(languages?.isAvailable('es', 'fr'), true);
      assert.strictEqual(languages?.isAvailable('en', 'en'), false);
      assert.strictEqual(languages?.isAvailable('en', 'uk'), false);
    });
  });
});
