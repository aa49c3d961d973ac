import { logger } from '../../utils/logger.js';
import { ValidationError } from '../../utils/errors.js';
import type { Document } from '../../domain/Document.js';

export interface WordChunk {
  text: string;
  index: number;
  startChar: number;
}

/**
 * Splits text into overlapping windows of words.
 *
 * Units are produced by splitting on single spaces and keeping the space on
 * each unit, so joining a window reproduces the original text slice.
 */
export class WordSplitter {
  constructor(private chunkSize = 512, private chunkOverlap = 50) {
    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      throw new ValidationError(`chunkSize must be a positive integer, got ${chunkSize}`);
    }
    if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
      throw new ValidationError(`chunkOverlap must be in [0, ${chunkSize}), got ${chunkOverlap}`);
    }
  }

  splitText(text: string): WordChunk[] {
    const units = text.split(' ').map((unit, i, all) => (i < all.length - 1 ? `${unit} ` : unit));
    const step = this.chunkSize - this.chunkOverlap;
    const chunks: WordChunk[] = [];

    let startChar = 0;
    let consumedUnits = 0;
    for (let start = 0; start < units.length; start += step) {
      for (; consumedUnits < start; consumedUnits++) {
        startChar += units[consumedUnits].length;
      }

      const window = units.slice(start, start + this.chunkSize).join('');
      if (window.trim().length > 0) {
        chunks.push({ text: window, index: chunks.length, startChar });
      }
      if (start + this.chunkSize >= units.length) break;
    }

    return chunks;
  }

  /**
   * Chunk ids are `${sourceId}#${splitId}`; every chunk carries its source
   * document's metadata plus `source_id`, `split_id` and `split_idx_start`.
   */
  splitDocuments(documents: Document[]): Document[] {
    const chunks = documents.flatMap(doc =>
      this.splitText(doc.content).map(chunk => ({
        id: `${doc.id}#${chunk.index}`,
        content: chunk.text,
        metadata: {
          ...doc.metadata,
          source_id: doc.id,
          split_id: chunk.index,
          split_idx_start: chunk.startChar,
        },
      }))
    );

    logger.debug(
      { documents: documents.length, chunks: chunks.length, chunkSize: this.chunkSize, overlap: this.chunkOverlap },
      'Split documents into chunks'
    );
    return chunks;
  }
}
