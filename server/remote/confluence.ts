import type { AppConfig } from '../../shared/config';
import { InsightsError } from '../errors';
import { normalize } from '../extraction/normalizer';
import type { Logger } from '../obs/logger';
import { fetchWithTimeout, pick, readJsonOrThrow } from '../utils/http';

export interface RemoteContent {
  title: string;
  content: string;
}

export interface ConfluenceCredentials {
  email?: string | null;
  token?: string | null;
}

const PAGE_PATH_ID = /pages\/(\d+)/;
const VIEWPAGE_ID = /viewpage\.action\?pageId=(\d+)/;
const TRUSTED_PROTOCOLS = new Set(['http:', 'https:']);

export const resolvePageId = (url: string): string => {
  const pathMatch = url.match(PAGE_PATH_ID);
  if (pathMatch) {
    return pathMatch[1];
  }

  const viewPageMatch = url.match(VIEWPAGE_ID);
  if (viewPageMatch) {
    return viewPageMatch[1];
  }

  const [, afterParam] = url.split('pageId=');
  if (afterParam !== undefined) {
    const idPart = afterParam.split('&')[0];
    if (/^\d+$/.test(idPart)) {
      return idPart;
    }
  }

  throw new InsightsError('UnresolvableReference', `Unable to extract page ID from Confluence URL: ${url}`);
};

/** Scheme + host (+ port) of the page URL; the scheme is kept as given. */
export const deriveBaseUrl = (url: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new InsightsError('UnresolvableReference', `Unable to extract base URL from: ${url}`);
  }
  if (!TRUSTED_PROTOCOLS.has(parsed.protocol)) {
    throw new InsightsError('UnresolvableReference', `Unsupported protocol: ${parsed.protocol}`);
  }
  return `${parsed.protocol}//${parsed.host}`;
};

export const buildApiUrl = (baseUrl: string, pageId: string): string =>
  `${baseUrl}/wiki/rest/api/content/${pageId}?expand=body.storage,title`;

const stripTags = (html: string): string => html.replace(/<[^>]+>/g, ' ');

const decodeEntities = (text: string): string =>
  text
    .replace(/&nbsp;/g, ' ')
    .replace(/&amp;/g, '&')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'");

/** Storage-format markup to a single line of plain text. */
export const cleanMarkup = (html: string | null | undefined): string => {
  if (!html || !html.trim()) {
    return '';
  }
  return decodeEntities(stripTags(html)).replace(/\s+/g, ' ').trim();
};

const firstNonBlank = (...values: Array<string | null | undefined>): string | undefined =>
  values.find((value): value is string => typeof value === 'string' && value.trim().length > 0);

export const basicAuthHeader = (email: string, token: string): string =>
  `Basic ${Buffer.from(`${email}:${token}`, 'utf-8').toString('base64')}`;

export const parsePageResponse = (payload: unknown): RemoteContent => {
  const rawTitle = pick(payload, 'title');
  const title = typeof rawTitle === 'string' && rawTitle.trim() ? rawTitle : 'Untitled';
  const storage = pick(payload, 'body', 'storage', 'value');
  const content = normalize(cleanMarkup(typeof storage === 'string' ? storage : ''));
  if (!content) {
    throw new InsightsError('EmptyContent', 'No content found in Confluence page');
  }
  return { title, content };
};

export class ConfluenceFetcher {
  constructor(
    private config: Pick<AppConfig, 'confluence'>,
    private logger: Logger,
  ) {}

  async fetch(pageUrl: string, credentials: ConfluenceCredentials = {}, signal?: AbortSignal): Promise<RemoteContent> {
    this.logger.info('Fetching Confluence content', { url: pageUrl });

    const pageId = resolvePageId(pageUrl);
    const apiUrl = buildApiUrl(deriveBaseUrl(pageUrl), pageId);

    const email = firstNonBlank(credentials.email, this.config.confluence.defaultEmail);
    const token = firstNonBlank(credentials.token, this.config.confluence.defaultToken);

    const headers: Record<string, string> = {
      Accept: 'application/json',
      'Content-Type': 'application/json',
    };
    if (email && token) {
      headers.Authorization = basicAuthHeader(email, token);
      this.logger.debug('Using authentication for Confluence API request', { pageId });
    } else {
      this.logger.warn('No Confluence credentials provided - attempting unauthenticated request', { pageId });
    }

    const response = await fetchWithTimeout(apiUrl, {
      headers,
      timeoutMs: this.config.confluence.timeoutMs,
      signal,
      service: 'Confluence',
    });
    const payload = await readJsonOrThrow(response, 'Confluence');
    return parsePageResponse(payload);
  }
}
