import { z } from 'zod';

export const DocumentSourceTypeSchema = z.enum(['upload', 'confluence']);

export type DocumentSourceType = z.infer<typeof DocumentSourceTypeSchema>;

export const StoredDocumentSchema = z.object({
  id: z.string().min(1),
  originalName: z.string().min(1),
  type: DocumentSourceTypeSchema,
  content: z.string().min(1),
  url: z.string().nullable().optional(),
  uploadedAt: z.string().min(1),
  fileSize: z.number().int().nonnegative().nullable().optional(),
  fileExtension: z.string().nullable().optional(),
  mimeType: z.string().nullable().optional(),
  typeLabel: z.string().nullable().optional(),
  filePath: z.string().nullable().optional(),
});

export type StoredDocument = z.infer<typeof StoredDocumentSchema>;

export type NewDocument = Omit<StoredDocument, 'id' | 'uploadedAt' | 'filePath'>;

export interface DocumentDto {
  id: string;
  originalName: string;
  type: DocumentSourceType;
  contentPreview: string;
  url: string | null;
  uploadedAt: string;
  fileSize: number | null;
  fileExtension: string | null;
  mimeType: string | null;
  typeLabel: string | null;
}

export interface UploadResponse {
  message: string;
  documentId: string;
  originalName: string;
  contentPreview: string;
}

export interface InsightsResponse {
  query: string;
  insights: string;
  provider: string;
  documentsAnalyzed: number;
  timestamp: string;
}

export interface DocumentStats {
  totalDocuments: number;
  uploadedDocuments: number;
  confluenceDocuments: number;
  totalFileSize: number;
}

export interface ErrorResponse {
  error: string;
  kind?: string;
}

const optionalText = z.string().nullish();

export const ConfluenceRequestSchema = z.object({
  url: z.string().trim().min(1, 'Confluence URL is required'),
  confluenceToken: optionalText,
  confluenceEmail: optionalText,
});

export type ConfluenceRequest = z.infer<typeof ConfluenceRequestSchema>;

export const InsightsRequestSchema = z.object({
  query: z.string().trim().min(1, 'Query is required'),
  documentIds: z.array(z.string().min(1)).nullish(),
  provider: optionalText,
});

export type InsightsRequest = z.infer<typeof InsightsRequestSchema>;

export const TopicsRequestSchema = z.object({
  documentIds: z.array(z.string().min(1)).nullish(),
  provider: optionalText,
});

export type TopicsRequest = z.infer<typeof TopicsRequestSchema>;

export interface SummaryResponse {
  documentId: string;
  originalName: string;
  summary: string;
}

export interface TopicsResponse {
  topics: string[];
  documentsAnalyzed: number;
}
