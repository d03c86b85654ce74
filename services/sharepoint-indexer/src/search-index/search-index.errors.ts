export class SearchIndexError extends Error {
  public constructor(
    message: string,
    public readonly statusCode: number,
    public readonly responseBody?: string,
  ) {
    super(message);
    this.name = 'SearchIndexError';
  }
}

export interface FailedDocument {
  key: string;
  statusCode: number;
  errorMessage: string | null;
}

/** Raised when the index accepted the request but rejected some of its documents. */
export class DocumentIndexingError extends Error {
  public constructor(
    public readonly failedDocuments: FailedDocument[],
    public readonly statusCode?: number,
  ) {
    super(
      failedDocuments.length > 0
        ? `Failed to index ${failedDocuments.length} document(s): ${failedDocuments
            .map((document) => document.key)
            .join(', ')}`
        : `Search index responded with status ${statusCode ?? 'unknown'} without listing failed documents`,
    );
    this.name = 'DocumentIndexingError';
  }

  public get failedKeys(): string[] {
    return this.failedDocuments.map((document) => document.key);
  }
}
