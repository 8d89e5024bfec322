import type { Server } from 'node:http';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createMemoryDocumentStore } from '../../../shared/documentStore';
import { createApp } from '../../app';
import { buildConfig } from '../../config/config';
import { InsightsError } from '../../errors';
import { createSilentLogger } from '../../obs/logger';
import { ConfluenceFetcher, type RemoteContent } from '../../remote/confluence';
import { pick } from '../../utils/http';

const PAGE_URL = 'https://acme.atlassian.net/wiki/spaces/ENG/pages/12345/Runbook';

class StubConfluenceFetcher extends ConfluenceFetcher {
  async fetch(pageUrl: string): Promise<RemoteContent> {
    if (pageUrl.includes('/pages/')) {
      return { title: 'Runbook', content: 'Restart the worker first.' };
    }
    throw new InsightsError('UnresolvableReference', `Unable to extract page ID from Confluence URL: ${pageUrl}`);
  }
}

describe('document routes', () => {
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    const config = buildConfig({ UPLOAD_MAX_BYTES: '1024' });
    const logger = createSilentLogger();
    const app = createApp({
      config,
      logger,
      store: createMemoryDocumentStore(),
      confluence: new StubConfluenceFetcher(config, logger),
    });
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('Server did not bind to a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  });

  const postJson = (route: string, body: unknown) =>
    fetch(`${baseUrl}${route}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });

  const uploadFile = (filename: string, content: string) => {
    const form = new FormData();
    form.append('file', new Blob([content], { type: 'text/plain' }), filename);
    return fetch(`${baseUrl}/api/documents/upload`, { method: 'POST', body: form });
  };

  const uploadedId = async (filename: string, content: string): Promise<string> => {
    const response = await uploadFile(filename, content);
    const documentId = pick(await response.json(), 'documentId');
    if (typeof documentId !== 'string') {
      throw new Error(`Upload of ${filename} returned no document id`);
    }
    return documentId;
  };

  it('answers health and public config', async () => {
    const health = await fetch(`${baseUrl}/api/healthz`);
    expect(health.status).toBe(200);
    await expect(health.json()).resolves.toMatchObject({ ok: true });

    const config = await fetch(`${baseUrl}/api/config`);
    await expect(config.json()).resolves.toMatchObject({
      provider: 'demo',
      uploads: { maxBytes: 1024, extensions: ['.pdf', '.doc', '.docx', '.txt'] },
    });
  });

  it('uploads a text file', async () => {
    const response = await uploadFile('notes.txt', 'Hello   world');

    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toEqual({
      message: 'Document uploaded and processed successfully',
      documentId: expect.any(String),
      originalName: 'notes.txt',
      contentPreview: 'Hello world',
    });
  });

  it('maps upload failures to status codes with their kind', async () => {
    const missing = await postJson('/api/documents/upload', {});
    expect(missing.status).toBe(400);
    await expect(missing.json()).resolves.toEqual({ error: 'No file uploaded', kind: 'InvalidUpload' });

    const tooLarge = await uploadFile('big.txt', 'x'.repeat(2000));
    expect(tooLarge.status).toBe(400);
    await expect(tooLarge.json()).resolves.toEqual({
      error: 'File too large: exceeds upload limit',
      kind: 'InvalidUpload',
    });

    const unsupported = await uploadFile('image.png', 'pixels');
    expect(unsupported.status).toBe(422);
    await expect(unsupported.json()).resolves.toEqual({ error: 'Unsupported file type: .png', kind: 'UnsupportedFormat' });

    const blank = await uploadFile('blank.txt', '   ');
    expect(blank.status).toBe(422);
    await expect(blank.json()).resolves.toMatchObject({ kind: 'EmptyContent' });
  });

  it('adds Confluence content and validates the body', async () => {
    const added = await postJson('/api/documents/confluence', { url: PAGE_URL });
    expect(added.status).toBe(200);
    await expect(added.json()).resolves.toMatchObject({
      message: 'Confluence content fetched and processed successfully',
      originalName: 'Runbook',
      contentPreview: 'Restart the worker first.',
    });

    const missingUrl = await postJson('/api/documents/confluence', {});
    expect(missingUrl.status).toBe(400);
    await expect(missingUrl.json()).resolves.toEqual({ error: 'url: Required', kind: 'InvalidRequest' });

    const unresolvable = await postJson('/api/documents/confluence', { url: 'https://wiki.example.com/display/ENG' });
    expect(unresolvable.status).toBe(400);
    await expect(unresolvable.json()).resolves.toMatchObject({ kind: 'UnresolvableReference' });
  });

  it('generates insights over stored documents', async () => {
    const empty = await postJson('/api/documents/insights', { query: 'What ships?' });
    expect(empty.status).toBe(400);
    await expect(empty.json()).resolves.toEqual({ error: 'No documents available for analysis', kind: 'InvalidRequest' });

    await uploadedId('plan.txt', 'Ship v2 in March.');

    const response = await postJson('/api/documents/insights', { query: 'What ships?' });
    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toMatchObject({
      query: 'What ships?',
      provider: 'demo',
      documentsAnalyzed: 1,
      insights: expect.stringContaining('• plan.txt (upload)'),
    });

    const blankQuery = await postJson('/api/documents/insights', { query: '   ' });
    expect(blankQuery.status).toBe(400);
    await expect(blankQuery.json()).resolves.toEqual({ error: 'query: Query is required', kind: 'InvalidRequest' });

    const unknownIds = await postJson('/api/documents/insights', { query: 'q', documentIds: ['nope'] });
    expect(unknownIds.status).toBe(404);

    const badProvider = await postJson('/api/documents/insights', { query: 'q', provider: 'mistral' });
    expect(badProvider.status).toBe(400);
    await expect(badProvider.json()).resolves.toEqual({ error: 'Unsupported AI provider: mistral', kind: 'UnsupportedProvider' });
  });

  it('rejects malformed JSON', async () => {
    const response = await fetch(`${baseUrl}/api/documents/insights`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"query": ',
    });

    expect(response.status).toBe(400);
    await expect(response.json()).resolves.toEqual({ error: 'Malformed JSON body', kind: 'InvalidRequest' });
  });

  it('lists, searches, filters, summarizes and deletes', async () => {
    const id = await uploadedId('plan.txt', 'Ship v2 in March.');
    await postJson('/api/documents/confluence', { url: PAGE_URL });

    await expect((await fetch(`${baseUrl}/api/documents`)).json()).resolves.toHaveLength(2);

    await expect((await fetch(`${baseUrl}/api/documents/search?keyword=worker`)).json()).resolves.toEqual([
      expect.objectContaining({ originalName: 'Runbook', type: 'confluence' }),
    ]);

    await expect((await fetch(`${baseUrl}/api/documents/type/upload`)).json()).resolves.toEqual([
      expect.objectContaining({ id, originalName: 'plan.txt' }),
    ]);

    await expect((await fetch(`${baseUrl}/api/documents/stats`)).json()).resolves.toEqual({
      totalDocuments: 2,
      uploadedDocuments: 1,
      confluenceDocuments: 1,
      totalFileSize: 17,
    });

    await expect((await fetch(`${baseUrl}/api/documents/${id}/summary`)).json()).resolves.toMatchObject({
      documentId: id,
      summary: expect.stringMatching(/^\*\*Demo Summary for: plan\.txt\*\*/),
    });

    const topics = await postJson('/api/documents/topics', {});
    await expect(topics.json()).resolves.toEqual({
      topics: ['Demo Topic 1', 'Demo Topic 2', 'Demo Topic 3', 'Demo Topic 4', 'Demo Topic 5'],
      documentsAnalyzed: 2,
    });

    const single = await fetch(`${baseUrl}/api/documents/${id}`);
    await expect(single.json()).resolves.toMatchObject({ id, originalName: 'plan.txt', contentPreview: 'Ship v2 in March.' });

    const deleted = await fetch(`${baseUrl}/api/documents/${id}`, { method: 'DELETE' });
    await expect(deleted.json()).resolves.toEqual({ message: 'Document deleted successfully' });

    const gone = await fetch(`${baseUrl}/api/documents/${id}`);
    expect(gone.status).toBe(404);
    await expect(gone.json()).resolves.toEqual({ error: `Document not found with ID: ${id}`, kind: 'NotFound' });
  });
});
