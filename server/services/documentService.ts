import type { AppConfig } from '../../shared/config';
import type { DocumentStore } from '../../shared/documentStore';
import {
  DocumentSourceTypeSchema,
  type ConfluenceRequest,
  type DocumentDto,
  type DocumentStats,
  type InsightsRequest,
  type InsightsResponse,
  type StoredDocument,
  type SummaryResponse,
  type TopicsRequest,
  type TopicsResponse,
  type UploadResponse,
} from '../../shared/types';
import { InsightsError } from '../errors';
import { documentMetadata, extractText, validateUpload } from '../extraction/textExtractor';
import { errorMessage, type Logger } from '../obs/logger';
import type { ConfluenceFetcher } from '../remote/confluence';
import { buildExcerpt } from '../utils/text';
import type { InsightService } from './insightService';
import type { InsightDocument } from './providers/types';

export const UPLOAD_PREVIEW_LENGTH = 500;
export const LISTING_PREVIEW_LENGTH = 200;

export interface UploadedFile {
  originalname: string;
  size: number;
  mimetype?: string;
  buffer: Buffer;
}

export interface DocumentServiceDeps {
  store: DocumentStore;
  confluence: ConfluenceFetcher;
  insights: InsightService;
}

export const toInsightDocument = (document: StoredDocument): InsightDocument => ({
  id: document.id,
  name: document.originalName,
  type: document.type,
  content: document.content,
});

export const toDocumentDto = (document: StoredDocument): DocumentDto => ({
  id: document.id,
  originalName: document.originalName,
  type: document.type,
  contentPreview: buildExcerpt(document.content, LISTING_PREVIEW_LENGTH),
  url: document.url ?? null,
  uploadedAt: document.uploadedAt,
  fileSize: document.fileSize ?? null,
  fileExtension: document.fileExtension ?? null,
  mimeType: document.mimeType ?? null,
  typeLabel: document.typeLabel ?? null,
});

const notFound = (id: string) => new InsightsError('NotFound', `Document not found with ID: ${id}`);

/**
 * Document lifecycle around the store: ingestion from uploads and Confluence,
 * listings, and the insight operations over stored content.
 */
export class DocumentService {
  constructor(
    private config: Pick<AppConfig, 'uploads'>,
    private logger: Logger,
    private deps: DocumentServiceDeps,
  ) {}

  async uploadDocument(file: UploadedFile): Promise<UploadResponse> {
    this.logger.info('Uploading document', { name: file.originalname, size: file.size });

    const format = validateUpload({ filename: file.originalname, size: file.size }, this.config.uploads.maxBytes);
    // Nothing is persisted until extraction succeeds.
    const content = await extractText(file.buffer, format);
    const metadata = documentMetadata(file.originalname, file.size);

    const saved = await this.deps.store.save(
      {
        originalName: file.originalname,
        type: 'upload',
        content,
        fileSize: metadata.size,
        fileExtension: metadata.extension,
        mimeType: file.mimetype ?? null,
        typeLabel: metadata.typeLabel,
      },
      { rawBytes: file.buffer },
    );

    this.logger.info('Document uploaded and processed successfully', { documentId: saved.id });
    return {
      message: 'Document uploaded and processed successfully',
      documentId: saved.id,
      originalName: saved.originalName,
      contentPreview: buildExcerpt(saved.content, UPLOAD_PREVIEW_LENGTH),
    };
  }

  async addConfluenceContent(request: ConfluenceRequest, signal?: AbortSignal): Promise<UploadResponse> {
    this.logger.info('Adding Confluence content', { url: request.url });

    const page = await this.deps.confluence
      .fetch(request.url, { email: request.confluenceEmail, token: request.confluenceToken }, signal)
      .catch((error: unknown) => {
        this.logger.error('Error adding Confluence content', { url: request.url, error: errorMessage(error) });
        throw error;
      });

    const saved = await this.deps.store.save({
      originalName: page.title,
      type: 'confluence',
      content: page.content,
      url: request.url,
    });

    this.logger.info('Confluence content added successfully', { documentId: saved.id });
    return {
      message: 'Confluence content fetched and processed successfully',
      documentId: saved.id,
      originalName: saved.originalName,
      contentPreview: buildExcerpt(saved.content, UPLOAD_PREVIEW_LENGTH),
    };
  }

  async generateInsights(request: InsightsRequest, signal?: AbortSignal): Promise<InsightsResponse> {
    const documents = await this.resolveDocuments(request.documentIds);
    const provider = this.deps.insights.resolveProvider(request.provider);
    const insights = await this.deps.insights.generateInsights(
      request.query,
      documents.map(toInsightDocument),
      provider,
      signal,
    );
    return {
      query: request.query,
      insights,
      provider,
      documentsAnalyzed: documents.length,
      timestamp: new Date().toISOString(),
    };
  }

  async listDocuments(): Promise<DocumentDto[]> {
    const documents = await this.deps.store.list();
    return documents.map(toDocumentDto);
  }

  async getDocument(id: string): Promise<DocumentDto> {
    return toDocumentDto(await this.requireDocument(id));
  }

  async deleteDocument(id: string): Promise<void> {
    this.logger.info('Deleting document', { documentId: id });
    const deleted = await this.deps.store.delete(id);
    if (!deleted) {
      throw notFound(id);
    }
    this.logger.info('Document deleted successfully', { documentId: id });
  }

  /** Case-insensitive substring match over document content. */
  async searchDocuments(keyword: string): Promise<DocumentDto[]> {
    const needle = keyword.trim().toLowerCase();
    if (!needle) {
      throw new InsightsError('InvalidRequest', 'Search keyword is required');
    }
    const documents = await this.deps.store.list();
    return documents.filter((doc) => doc.content.toLowerCase().includes(needle)).map(toDocumentDto);
  }

  async getDocumentsByType(type: string): Promise<DocumentDto[]> {
    const parsed = DocumentSourceTypeSchema.safeParse(type.trim().toLowerCase());
    if (!parsed.success) {
      return [];
    }
    const documents = await this.deps.store.list();
    return documents.filter((doc) => doc.type === parsed.data).map(toDocumentDto);
  }

  async getDocumentStats(): Promise<DocumentStats> {
    const documents = await this.deps.store.list();
    return {
      totalDocuments: documents.length,
      uploadedDocuments: documents.filter((doc) => doc.type === 'upload').length,
      confluenceDocuments: documents.filter((doc) => doc.type === 'confluence').length,
      totalFileSize: documents.reduce((total, doc) => total + (doc.fileSize ?? 0), 0),
    };
  }

  async summarizeDocument(id: string, provider?: string | null): Promise<SummaryResponse> {
    const document = await this.requireDocument(id);
    const summary = await this.deps.insights.summarizeDocument(toInsightDocument(document), provider);
    return { documentId: document.id, originalName: document.originalName, summary };
  }

  async extractKeyTopics(request: TopicsRequest): Promise<TopicsResponse> {
    const documents = await this.resolveDocuments(request.documentIds);
    const topics = await this.deps.insights.extractKeyTopics(documents.map(toInsightDocument), request.provider);
    return { topics, documentsAnalyzed: documents.length };
  }

  private async requireDocument(id: string): Promise<StoredDocument> {
    const document = await this.deps.store.get(id);
    if (!document) {
      throw notFound(id);
    }
    return document;
  }

  /** Named documents in request order, or the whole corpus when none are named. */
  private async resolveDocuments(ids: string[] | null | undefined): Promise<StoredDocument[]> {
    let documents: StoredDocument[];
    if (ids && ids.length > 0) {
      const found = await Promise.all(ids.map((id) => this.deps.store.get(id)));
      const missing = ids.filter((_, index) => found[index] === null);
      if (missing.length > 0) {
        throw new InsightsError('NotFound', `Some requested documents were not found: ${missing.join(', ')}`);
      }
      documents = found.filter((doc): doc is StoredDocument => doc !== null);
    } else {
      documents = await this.deps.store.list();
    }

    if (documents.length === 0) {
      throw new InsightsError('InvalidRequest', 'No documents available for analysis');
    }
    return documents;
  }
}
