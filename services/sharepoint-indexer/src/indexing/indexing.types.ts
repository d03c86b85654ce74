import type { ProcessingSummary } from '../processing-pipeline/item-processing-orchestrator.service';

export type SourceSyncStatus = 'completed' | 'failed';

export interface SyncSummary extends ProcessingSummary {
  siteDomain: string;
  siteName: string;
  status: SourceSyncStatus;
  foldersScanned: number;
  failedFolders: number;
  documentsFound: number;
}

export type SyncResult =
  | { status: 'completed'; sources: SyncSummary[] }
  | { status: 'skipped'; sources: [] };

export function hasFailures(result: SyncResult): boolean {
  return result.sources.some(
    (source) => source.status === 'failed' || source.failed > 0 || source.failedFolders > 0,
  );
}
