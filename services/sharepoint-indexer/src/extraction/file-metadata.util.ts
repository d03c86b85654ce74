import type { DriveItem, IdentitySet } from '../microsoft-apis/graph/types/sharepoint.types';

export interface FileMetadata {
  id: string;
  source: string | null;
  name: string;
  size: number | null;
  createdBy: string | null;
  lastModifiedBy: string | null;
  createdAt: string | null;
  lastModifiedAt: string | null;
}

// fileSystemInfo timestamps are UTC but not always suffixed with Z
export function toUtcTimestamp(timestamp: string | undefined): string | null {
  if (!timestamp) return null;
  return timestamp.endsWith('Z') ? timestamp : `${timestamp}Z`;
}

export function displayNameOf(identitySet: IdentitySet | undefined): string | null {
  return identitySet?.user?.displayName ?? null;
}

export function extractFileMetadata(item: DriveItem): FileMetadata {
  return {
    id: item.id,
    source: item.webUrl ?? null,
    name: item.name,
    size: item.size ?? null,
    createdBy: displayNameOf(item.createdBy),
    lastModifiedBy: displayNameOf(item.lastModifiedBy),
    createdAt: toUtcTimestamp(item.fileSystemInfo?.createdDateTime),
    lastModifiedAt: toUtcTimestamp(item.fileSystemInfo?.lastModifiedDateTime),
  };
}
