export type ExtractedDocumentKind = 'file' | 'sitePage';

export interface ExtractedDocument {
  kind: ExtractedDocumentKind;
  id: string;
  name: string;
  source: string | null;
  size: number | null;
  content: string | null;
  createdBy: string | null;
  lastModifiedBy: string | null;
  createdAt: string | null;
  lastModifiedAt: string | null;
  readAccessEntities: string[];
}

export interface RetrieveFilesParams {
  siteId: string;
  driveId: string;
  folderPath?: string;
  fileNames?: string | readonly string[];
  minutesAgo?: number;
  fileFormats?: readonly string[];
}
