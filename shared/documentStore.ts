import { randomId } from './crypto';
import type { NewDocument, StoredDocument } from './types';

export interface SaveOptions {
  /** Original upload bytes, kept beside the record when the store supports it. */
  rawBytes?: Buffer;
}

export interface DocumentStore {
  ensureLayout: () => Promise<void>;
  save: (document: NewDocument, options?: SaveOptions) => Promise<StoredDocument>;
  get: (id: string) => Promise<StoredDocument | null>;
  list: () => Promise<StoredDocument[]>;
  delete: (id: string) => Promise<boolean>;
}

export const createMemoryDocumentStore = (): DocumentStore => {
  const documents = new Map<string, StoredDocument>();

  return {
    ensureLayout: async () => {},
    save: async (document) => {
      const stored: StoredDocument = {
        ...document,
        id: randomId(),
        uploadedAt: new Date().toISOString(),
        filePath: null,
      };
      documents.set(stored.id, stored);
      return stored;
    },
    get: async (id) => documents.get(id) ?? null,
    list: async () => Array.from(documents.values()),
    delete: async (id) => documents.delete(id),
  };
};
