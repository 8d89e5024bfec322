import { PROMPT_TEMPLATES } from '../../shared/prompts';

export const loadPrompt = (filename: string): string => {
  const content = PROMPT_TEMPLATES[filename];
  if (!content) {
    throw new Error(`Missing prompt template: ${filename}`);
  }
  return content;
};

/** Replaces every `{KEY}` placeholder; unknown placeholders are left untouched. */
export const fillPrompt = (template: string, values: Record<string, string>): string =>
  template.replace(/\{([A-Z_]+)\}/g, (match, key: string) => (key in values ? values[key] : match));
