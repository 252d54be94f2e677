export interface Embedder {
  embedTexts(texts: string[]): Promise<number[][]>;
  dims(): number;
  id(): string;
}
