import type { CanvasLayout, WebPart } from '../microsoft-apis/graph/types/sharepoint.types';

const NAMED_ENTITIES = new Map([
  ['amp', '&'],
  ['lt', '<'],
  ['gt', '>'],
  ['quot', '"'],
  ['apos', "'"],
  ['nbsp', ' '],
]);

const BLOCK_TAGS = /<\/?(p|div|br|li|ul|ol|h[1-6]|tr|table|section|blockquote)\b[^>]*>/gi;

export function decodeHtmlEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (entity: string, body: string) => {
    if (body.startsWith('#x') || body.startsWith('#X')) {
      return String.fromCodePoint(Number.parseInt(body.slice(2), 16));
    }
    if (body.startsWith('#')) {
      return String.fromCodePoint(Number.parseInt(body.slice(1), 10));
    }
    return NAMED_ENTITIES.get(body.toLowerCase()) ?? entity;
  });
}

/** Converts web part HTML to plain text, one line per block element. */
export function htmlToPlainText(html: string): string {
  const withBreaks = html
    .replace(/<(script|style)\b[^>]*>[\s\S]*?<\/\1>/gi, '')
    .replace(BLOCK_TAGS, '\n')
    .replace(/<[^>]+>/g, '');

  return decodeHtmlEntities(withBreaks)
    .split('\n')
    .map((line) => line.replace(/\s+/g, ' ').trim())
    .filter(Boolean)
    .join('\n');
}

function webPartsOf(canvasLayout: CanvasLayout): WebPart[] {
  const horizontal = (canvasLayout.horizontalSections ?? []).flatMap((section) =>
    (section.columns ?? []).flatMap((column) => column.webparts ?? []),
  );
  return [...horizontal, ...(canvasLayout.verticalSection?.webparts ?? [])];
}

export function extractCanvasText(canvasLayout: CanvasLayout | undefined): string {
  if (!canvasLayout) return '';
  return webPartsOf(canvasLayout)
    .map((webPart) => (webPart.innerHtml ? htmlToPlainText(webPart.innerHtml) : ''))
    .filter(Boolean)
    .join('\n');
}
