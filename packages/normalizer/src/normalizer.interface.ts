export interface ITextNormalizer {
  readonly format: string;
  /** Markup in, plain text out. Returns "" when the input cannot be parsed. */
  normalize(raw: string): string;
}
