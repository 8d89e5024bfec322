import pdf from 'pdf-parse';
import mammoth from 'mammoth';
import WordExtractor from 'word-extractor';
import { InsightsError, isInsightsError } from '../errors';
import { normalize } from './normalizer';

export type DocumentFormat = 'pdf' | 'legacy-word' | 'modern-word' | 'plain-text';

export interface DocumentMetadata {
  size: number;
  extension: string;
  typeLabel: string;
}

const FORMAT_BY_EXTENSION: Record<string, DocumentFormat> = {
  '.pdf': 'pdf',
  '.doc': 'legacy-word',
  '.docx': 'modern-word',
  '.txt': 'plain-text',
};

const TYPE_LABELS: Record<string, string> = {
  '.pdf': 'PDF Document',
  '.docx': 'Microsoft Word Document (DOCX)',
  '.doc': 'Microsoft Word Document (DOC)',
  '.txt': 'Text Document',
};

// Trailer (or xref stream dictionary) reference to an encryption dictionary.
const PDF_ENCRYPT_ENTRY = /\/Encrypt\s*(?:\d+\s+\d+\s+R|<<)/;

export const fileExtension = (filename: string): string => {
  const lastDot = filename.lastIndexOf('.');
  return lastDot === -1 ? '' : filename.slice(lastDot).toLowerCase();
};

export const isDocumentFormat = (value: string): value is DocumentFormat =>
  Object.values(FORMAT_BY_EXTENSION).some((format) => format === value);

export const formatFromFilename = (filename: string): DocumentFormat => {
  const extension = fileExtension(filename);
  const format = FORMAT_BY_EXTENSION[extension];
  if (!format) {
    throw new InsightsError('UnsupportedFormat', `Unsupported file type: ${extension || filename}`);
  }
  return format;
};

export const describeFormat = (extension: string): string => TYPE_LABELS[extension.toLowerCase()] ?? 'Unknown';

export const documentMetadata = (filename: string, size: number): DocumentMetadata => {
  const extension = fileExtension(filename);
  return { size, extension, typeLabel: describeFormat(extension) };
};

/**
 * Rejects an upload before any bytes are parsed. Size limits come from
 * `uploads.maxBytes`; the extension decides the format.
 */
export const validateUpload = (file: { filename?: string | null; size: number }, maxBytes: number): DocumentFormat => {
  const filename = file.filename?.trim();
  if (!filename) {
    throw new InsightsError('InvalidUpload', 'Invalid filename');
  }
  if (file.size === 0) {
    throw new InsightsError('InvalidUpload', 'File is empty');
  }
  if (file.size > maxBytes) {
    const megabytes = (file.size / 1024 / 1024).toFixed(2);
    throw new InsightsError('InvalidUpload', `File too large: ${megabytes} MB exceeds limit`);
  }
  return formatFromFilename(filename);
};

const requireText = (text: string, label: string): string => {
  if (!text.trim()) {
    throw new InsightsError('EmptyContent', `No text content found in ${label}`);
  }
  return text;
};

export const isEncryptedPdf = (bytes: Buffer): boolean => PDF_ENCRYPT_ENTRY.test(bytes.toString('latin1'));

const extractPdf = async (bytes: Buffer): Promise<string> => {
  if (isEncryptedPdf(bytes)) {
    throw new InsightsError('Encrypted', 'Encrypted PDF files are not supported');
  }
  try {
    const result = await pdf(bytes);
    return requireText(result.text, 'PDF');
  } catch (error) {
    if (error instanceof Error && error.name === 'PasswordException') {
      throw new InsightsError('Encrypted', 'Encrypted PDF files are not supported', { cause: error });
    }
    throw error;
  }
};

const extractModernWord = async (bytes: Buffer): Promise<string> => {
  const result = await mammoth.extractRawText({ buffer: bytes });
  return requireText(result.value, 'DOCX document');
};

const extractLegacyWord = async (bytes: Buffer): Promise<string> => {
  const extractor = new WordExtractor();
  const document = await extractor.extract(bytes);
  return requireText(document.getBody(), 'DOC document');
};

const extractPlainText = async (bytes: Buffer): Promise<string> =>
  requireText(bytes.toString('utf-8'), 'text file');

const EXTRACTORS: Record<DocumentFormat, (bytes: Buffer) => Promise<string>> = {
  pdf: extractPdf,
  'legacy-word': extractLegacyWord,
  'modern-word': extractModernWord,
  'plain-text': extractPlainText,
};

/**
 * Turns raw bytes of a declared format into normalized, non-empty text.
 *
 * Fails with `UnsupportedFormat` for an unknown tag, `Encrypted` for protected
 * PDFs, `EmptyContent` when nothing but whitespace comes out, and
 * `ExtractionFailed` when the underlying parser rejects the bytes.
 */
export const extractText = async (bytes: Buffer, format: string): Promise<string> => {
  if (!isDocumentFormat(format)) {
    throw new InsightsError('UnsupportedFormat', `Unsupported document format: ${format}`);
  }

  let raw: string;
  try {
    raw = await EXTRACTORS[format](bytes);
  } catch (error) {
    if (isInsightsError(error)) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new InsightsError('ExtractionFailed', `Failed to process document: ${message}`, { cause: error });
  }

  const text = normalize(raw);
  if (!text) {
    throw new InsightsError('EmptyContent', 'No text content found in document');
  }
  return text;
};
