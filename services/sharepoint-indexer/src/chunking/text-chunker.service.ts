import { RecursiveCharacterTextSplitter } from '@langchain/textsplitters';
import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Config } from '../config';
import type { ChunkingConfig } from '../config/processing.config';

const isHighSurrogate = (code: number): boolean => code >= 0xd800 && code <= 0xdbff;
const isLowSurrogate = (code: number): boolean => code >= 0xdc00 && code <= 0xdfff;

// Moves an index that falls between the two halves of a surrogate pair back onto the pair's start.
function alignToCodePoint(text: string, index: number): number {
  if (index <= 0 || index >= text.length) return index;
  return isLowSurrogate(text.charCodeAt(index)) && isHighSurrogate(text.charCodeAt(index - 1))
    ? index - 1
    : index;
}

/**
 * Splits text into windows of `chunkSize` characters that start every
 * `chunkSize - chunkOverlap` characters. The last window ends at the end of the text.
 * Window edges never split a surrogate pair.
 */
export function splitFixedWindows(text: string, chunkSize: number, chunkOverlap: number): string[] {
  if (text.trim().length === 0) return [];

  const step = chunkSize - chunkOverlap;
  if (step <= 0) throw new Error('chunkOverlap must be smaller than chunkSize');

  const chunks: string[] = [];
  for (let start = 0; ; start += step) {
    chunks.push(
      text.slice(alignToCodePoint(text, start), alignToCodePoint(text, start + chunkSize)),
    );
    if (start + chunkSize >= text.length) break;
  }
  return chunks;
}

@Injectable()
export class TextChunkerService {
  private readonly config: ChunkingConfig;
  private readonly recursiveSplitter: RecursiveCharacterTextSplitter;

  public constructor(configService: ConfigService<Config, true>) {
    this.config = configService.get('processing.chunking', { infer: true });
    this.recursiveSplitter = new RecursiveCharacterTextSplitter({
      chunkSize: this.config.chunkSize,
      chunkOverlap: this.config.chunkOverlap,
    });
  }

  public async split(text: string): Promise<string[]> {
    if (text.trim().length === 0) return [];

    switch (this.config.strategy) {
      case 'fixed':
        return splitFixedWindows(text, this.config.chunkSize, this.config.chunkOverlap);
      case 'recursive':
        return await this.recursiveSplitter.splitText(text);
    }
  }
}
