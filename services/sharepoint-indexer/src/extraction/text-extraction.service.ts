import { Injectable, Logger } from '@nestjs/common';
import mammoth from 'mammoth';
import * as pdfjsLib from 'pdfjs-dist';

export type SupportedFormat = 'docx' | 'pdf';

export function detectSupportedFormat(fileName: string): SupportedFormat | null {
  const lowerCaseName = fileName.toLowerCase();
  if (lowerCaseName.endsWith('.docx')) return 'docx';
  if (lowerCaseName.endsWith('.pdf')) return 'pdf';
  return null;
}

@Injectable()
export class TextExtractionService {
  private readonly logger = new Logger(this.constructor.name);

  public async extractText(format: SupportedFormat, content: Buffer): Promise<string> {
    switch (format) {
      case 'docx':
        return await this.extractDocxText(content);
      case 'pdf':
        return await this.extractPdfText(content);
    }
  }

  private async extractDocxText(content: Buffer): Promise<string> {
    const result = await mammoth.extractRawText({ buffer: content });
    for (const message of result.messages) {
      this.logger.debug({ msg: 'Docx extraction message', type: message.type, detail: message.message });
    }
    // mammoth ends every paragraph with a blank line
    return result.value.replace(/\n\n$/, '').split('\n\n').join('\n');
  }

  private async extractPdfText(content: Buffer): Promise<string> {
    const pdfDocument = await pdfjsLib.getDocument({
      data: new Uint8Array(content),
      isEvalSupported: false,
      useSystemFonts: true,
    }).promise;

    try {
      const pageTexts: string[] = [];
      for (let pageNumber = 1; pageNumber <= pdfDocument.numPages; pageNumber++) {
        const page = await pdfDocument.getPage(pageNumber);
        const textContent = await page.getTextContent();
        const pageText = textContent.items
          .map((item) => ('str' in item ? `${item.str}${item.hasEOL ? '\n' : ''}` : ''))
          .join('');
        pageTexts.push(pageText.trimEnd());
        page.cleanup();
      }
      return pageTexts.join('\n');
    } finally {
      await pdfDocument.destroy();
    }
  }
}
