import type { AppConfig, ProviderName } from '../../../shared/config';

/** A stored document as the providers see it. */
export interface InsightDocument {
  id: string;
  /** Display name: original file name or page title. */
  name: string;
  /** Type tag, e.g. "upload" or "confluence". */
  type: string;
  content: string;
}

export interface ProviderRequest {
  query: string;
  documents: InsightDocument[];
  systemPrompt: string;
  prompt: string;
  signal?: AbortSignal;
}

export interface InsightProvider {
  readonly name: ProviderName;
  generate(request: ProviderRequest): Promise<string>;
}

export type AiSettings = AppConfig['ai'];
