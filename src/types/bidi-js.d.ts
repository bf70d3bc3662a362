// bidi-js ships without type declarations
declare module 'bidi-js' {
  export interface EmbeddingLevelsResult {
    levels: Uint8Array;
  }

  export interface Bidi {
    getEmbeddingLevels(
      text: string,
      explicitDirection?: 'ltr' | 'rtl' | 'auto',
    ): EmbeddingLevelsResult;
    getReorderedString(
      text: string,
      embeddingLevels: EmbeddingLevelsResult,
      start?: number,
      end?: number,
    ): string;
  }

  export default function bidiFactory(): Bidi;
}
