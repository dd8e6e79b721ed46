export interface Article {
  title: string;
  rawText: string;
}

export interface DumpReadStats {
  pages: number;
  articles: number;
  skippedNamespace: number;
  skippedRedirect: number;
  skippedEmpty: number;
}
