import fs from 'node:fs/promises';
import path from 'node:path';
import type { AppConfig } from '../../shared/config';
import { randomId } from '../../shared/crypto';
import type { DocumentStore } from '../../shared/documentStore';
import { StoredDocumentSchema, type StoredDocument } from '../../shared/types';
import type { Logger } from '../obs/logger';

const sanitizeSegment = (value: string): string =>
  value.replace(/[^a-z0-9_\-.]/gi, '_').slice(0, 80) || 'document';

const ensureDir = async (dir: string) => {
  await fs.mkdir(dir, { recursive: true });
};

const guardPath = (root: string, target: string) => {
  const relative = path.relative(root, target);
  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new Error(`Attempted to access a path outside of persistence root: ${target}`);
  }
};

const isMissing = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

/**
 * One JSON file per document under `persistence.documentsDir`; upload bytes go
 * to `persistence.uploadsDir` and are removed with the record.
 */
export const createFsDocumentStore = (config: Pick<AppConfig, 'persistence'>, logger: Logger): DocumentStore => {
  const { rootDir, documentsDir, uploadsDir } = config.persistence;

  const recordPath = (id: string) => {
    const target = path.join(documentsDir, `${sanitizeSegment(id)}.json`);
    guardPath(rootDir, target);
    return target;
  };

  const removeFile = async (target: string) => {
    try {
      await fs.unlink(target);
    } catch (error) {
      if (!isMissing(error)) throw error;
    }
  };

  const ensureLayout = async () => {
    await ensureDir(rootDir);
    await ensureDir(documentsDir);
    await ensureDir(uploadsDir);
  };

  const readRecord = async (target: string): Promise<StoredDocument | null> => {
    try {
      const raw = await fs.readFile(target, 'utf-8');
      const parsed = StoredDocumentSchema.safeParse(JSON.parse(raw));
      if (!parsed.success) {
        logger.warn('Skipping malformed document record', { path: target, issues: parsed.error.issues.length });
        return null;
      }
      return parsed.data;
    } catch (error) {
      if (isMissing(error)) return null;
      if (error instanceof SyntaxError) {
        logger.warn('Skipping unreadable document record', { path: target, error: error.message });
        return null;
      }
      throw error;
    }
  };

  const save: DocumentStore['save'] = async (document, options = {}) => {
    await ensureLayout();
    const id = randomId();
    let filePath: string | null = null;

    if (options.rawBytes) {
      const extension = document.fileExtension ? sanitizeSegment(document.fileExtension) : '';
      filePath = path.join(uploadsDir, `${id}${extension}`);
      guardPath(rootDir, filePath);
      await fs.writeFile(filePath, options.rawBytes);
    }

    const stored: StoredDocument = { ...document, id, uploadedAt: new Date().toISOString(), filePath };
    try {
      await fs.writeFile(recordPath(id), JSON.stringify(stored, null, 2), 'utf-8');
    } catch (error) {
      if (filePath) {
        await removeFile(filePath);
      }
      throw error;
    }
    return stored;
  };

  const get: DocumentStore['get'] = async (id) => readRecord(recordPath(id));

  const list: DocumentStore['list'] = async () => {
    let names: string[];
    try {
      names = await fs.readdir(documentsDir);
    } catch (error) {
      if (isMissing(error)) return [];
      throw error;
    }
    const records = await Promise.all(
      names.filter((name) => name.endsWith('.json')).map((name) => readRecord(path.join(documentsDir, name))),
    );
    return records
      .filter((record): record is StoredDocument => record !== null)
      .sort((a, b) => a.uploadedAt.localeCompare(b.uploadedAt));
  };

  const remove: DocumentStore['delete'] = async (id) => {
    const existing = await get(id);
    if (!existing) {
      return false;
    }
    if (existing.filePath && existing.type === 'upload') {
      guardPath(rootDir, existing.filePath);
      await removeFile(existing.filePath);
      logger.info('Deleted file', { path: existing.filePath });
    }
    await removeFile(recordPath(id));
    return true;
  };

  return {
    ensureLayout,
    save,
    get,
    list,
    delete: remove,
  };
};
