declare module 'word-extractor' {
  interface BodyOptions {
    filterUnicode?: boolean;
  }

  class WordDocument {
    getBody(options?: BodyOptions): string;
    getFootnotes(options?: BodyOptions): string;
    getEndnotes(options?: BodyOptions): string;
    getHeaders(options?: BodyOptions & { includeFooters?: boolean }): string;
    getFooters(options?: BodyOptions): string;
    getAnnotations(options?: BodyOptions): string;
    getTextboxes(options?: BodyOptions & { includeHeadersAndFooters?: boolean; includeBody?: boolean }): string;
  }

  class WordExtractor {
    extract(source: string | Buffer): Promise<WordDocument>;
  }

  export = WordExtractor;
}
