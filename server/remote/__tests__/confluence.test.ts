import { afterEach, describe, expect, it, vi } from 'vitest';
import { buildConfig } from '../../config/config';
import { RemoteError } from '../../errors';
import { createSilentLogger } from '../../obs/logger';
import {
  ConfluenceFetcher,
  buildApiUrl,
  cleanMarkup,
  deriveBaseUrl,
  parsePageResponse,
  resolvePageId,
} from '../confluence';

const PAGE_URL = 'https://acme.atlassian.net/wiki/spaces/ENG/pages/12345/Runbook';
const API_URL = 'https://acme.atlassian.net/wiki/rest/api/content/12345?expand=body.storage,title';

const jsonResponse = (payload: unknown, status = 200) =>
  new Response(JSON.stringify(payload), { status, headers: { 'content-type': 'application/json' } });

const stubFetch = () => {
  const fetchMock = vi.fn<(url: string, init: RequestInit) => Promise<Response>>();
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
};

const headersOf = (init: RequestInit | undefined): Record<string, string> => {
  const result: Record<string, string> = {};
  new Headers(init?.headers).forEach((value, key) => {
    result[key] = value;
  });
  return result;
};

const createFetcher = (env: Record<string, string> = {}) =>
  new ConfluenceFetcher(buildConfig({ CONFLUENCE_TIMEOUT_MS: '1000', ...env }), createSilentLogger());

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('resolvePageId', () => {
  it('reads the id from a pages path', () => {
    expect(resolvePageId(PAGE_URL)).toBe('12345');
  });

  it('reads the id from a viewpage action', () => {
    expect(resolvePageId('https://wiki.example.com/pages/viewpage.action?pageId=67890')).toBe('67890');
  });

  it('falls back to a pageId query parameter anywhere in the URL', () => {
    expect(resolvePageId('https://wiki.example.com/display/x?foo=1&pageId=4242&bar=2')).toBe('4242');
  });

  it('rejects URLs without a numeric page id', () => {
    expect(() => resolvePageId('https://wiki.example.com/display/ENG/Home')).toThrow(
      'Unable to extract page ID from Confluence URL: https://wiki.example.com/display/ENG/Home',
    );
    expect(() => resolvePageId('https://wiki.example.com/x?pageId=abc')).toThrow('Unable to extract page ID');
  });
});

describe('deriveBaseUrl', () => {
  it('keeps scheme, host and port', () => {
    expect(deriveBaseUrl('https://acme.atlassian.net:8443/wiki/x')).toBe('https://acme.atlassian.net:8443');
    expect(deriveBaseUrl('http://intranet/wiki/pages/1')).toBe('http://intranet');
  });

  it('rejects non-http URLs and garbage', () => {
    expect(() => deriveBaseUrl('ftp://files.example.com/pages/1')).toThrow('Unsupported protocol: ftp:');
    expect(() => deriveBaseUrl('not a url')).toThrow('Unable to extract base URL from: not a url');
  });

  it('builds the content API URL', () => {
    expect(buildApiUrl('https://acme.atlassian.net', '12345')).toBe(API_URL);
  });
});

describe('cleanMarkup', () => {
  it('strips tags, decodes entities and collapses whitespace', () => {
    const html = '<p>Tom &amp; Jerry&nbsp;&lt;3</p>\n<p>&quot;hi&quot; &#39;there&#39;</p>';
    expect(cleanMarkup(html)).toBe(`Tom & Jerry <3 "hi" 'there'`);
  });

  it('returns an empty string for blank input', () => {
    expect(cleanMarkup(null)).toBe('');
    expect(cleanMarkup('   ')).toBe('');
  });
});

describe('parsePageResponse', () => {
  it('defaults a missing title to Untitled', () => {
    expect(parsePageResponse({ body: { storage: { value: '<p>Body</p>' } } })).toEqual({
      title: 'Untitled',
      content: 'Body',
    });
  });

  it('fails when the page has no text', () => {
    expect(() => parsePageResponse({ title: 'Empty', body: { storage: { value: '<p> </p>' } } })).toThrow(
      'No content found in Confluence page',
    );
  });
});

describe('ConfluenceFetcher', () => {
  it('fetches and cleans a page with basic auth', async () => {
    const fetchMock = stubFetch();
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ title: 'Runbook', body: { storage: { value: '<h1>Deploy</h1><p>Step one</p>' } } }),
    );

    const page = await createFetcher().fetch(PAGE_URL, { email: 'user@example.com', token: 'test-secret' });

    expect(page).toEqual({ title: 'Runbook', content: 'Deploy Step one' });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(API_URL);
    expect(init.method).toBe('GET');
    expect(headersOf(init)).toEqual({
      accept: 'application/json',
      'content-type': 'application/json',
      authorization: `Basic ${Buffer.from('user@example.com:test-secret').toString('base64')}`,
    });
  });

  it('falls back to configured credentials', async () => {
    const fetchMock = stubFetch();
    fetchMock.mockResolvedValueOnce(jsonResponse({ title: 'T', body: { storage: { value: 'text' } } }));

    await createFetcher({ CONFLUENCE_EMAIL: 'bot@example.com', CONFLUENCE_API_TOKEN: 'test-token' }).fetch(PAGE_URL);

    const [, init] = fetchMock.mock.calls[0];
    expect(headersOf(init).authorization).toBe(
      `Basic ${Buffer.from('bot@example.com:test-token').toString('base64')}`,
    );
  });

  it('sends no Authorization header unless both email and token are present', async () => {
    const fetchMock = stubFetch();
    fetchMock.mockResolvedValueOnce(jsonResponse({ title: 'T', body: { storage: { value: 'text' } } }));

    await createFetcher().fetch(PAGE_URL, { email: 'user@example.com', token: '  ' });

    const [, init] = fetchMock.mock.calls[0];
    expect(headersOf(init).authorization).toBeUndefined();
  });

  it('surfaces non-2xx answers as RemoteError with status and body', async () => {
    const fetchMock = stubFetch();
    fetchMock.mockResolvedValueOnce(new Response('Page not found', { status: 404 }));

    const error = await createFetcher()
      .fetch(PAGE_URL)
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RemoteError);
    expect(error).toMatchObject({ kind: 'RemoteError', status: 404, body: 'Page not found' });
    expect(error).toHaveProperty('message', 'Confluence request failed with status 404: Page not found');
  });

  it('maps transport failures to RemoteError with status 0', async () => {
    const fetchMock = stubFetch();
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

    const error = await createFetcher()
      .fetch(PAGE_URL)
      .catch((err: unknown) => err);

    expect(error).toMatchObject({ kind: 'RemoteError', status: 0, body: 'fetch failed' });
  });

  it('does not call the network for an unresolvable URL', async () => {
    const fetchMock = stubFetch();

    await expect(createFetcher().fetch('https://wiki.example.com/display/ENG/Home')).rejects.toHaveProperty(
      'kind',
      'UnresolvableReference',
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('times out a request that never answers', async () => {
    const fetchMock = stubFetch();
    fetchMock.mockImplementationOnce(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        }),
    );

    const result = createFetcher({ CONFLUENCE_TIMEOUT_MS: '20' }).fetch(PAGE_URL);

    await expect(result).rejects.toHaveProperty('kind', 'Timeout');
    await expect(result).rejects.toThrow('Confluence request timed out after 20 ms');
  });
});
