import { fillPrompt, loadPrompt } from '../../prompts/loader';
import type { InsightDocument } from './types';

export const MAX_DOCUMENT_LENGTH = 10_000;
export const TRUNCATION_MARKER = '... [truncated]';

// Tail content past the limit is dropped without telling the caller.
export const truncateContent = (content: string, maxLength = MAX_DOCUMENT_LENGTH): string =>
  content.length > maxLength ? `${content.slice(0, maxLength)}${TRUNCATION_MARKER}` : content;

export const buildDocumentContext = (documents: InsightDocument[]): string =>
  documents
    .map((doc, index) => `=== DOCUMENT ${index + 1}: ${doc.name} ===\n${truncateContent(doc.content)}\n\n`)
    .join('');

export const buildDocumentList = (documents: InsightDocument[]): string =>
  documents.map((doc) => `- "${doc.name}" (${doc.type})`).join('\n');

export interface InsightPrompts {
  systemPrompt: string;
  prompt: string;
}

export const buildInsightPrompts = (query: string, documents: InsightDocument[]): InsightPrompts => ({
  systemPrompt: loadPrompt('insights_system.md'),
  prompt: fillPrompt(loadPrompt('insights_user.md'), {
    QUERY: query,
    DOCUMENT_LIST: buildDocumentList(documents),
    DOCUMENT_CONTENT: buildDocumentContext(documents),
  }),
});
