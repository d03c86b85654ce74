import { Injectable } from '@nestjs/common';
import type { DriveItem } from './types/sharepoint.types';

export interface FileFilterCriteria {
  minutesAgo?: number;
  fileFormats?: readonly string[];
  fileNames?: string | readonly string[];
}

// Graph returns fileSystemInfo timestamps without a zone for some libraries; they are UTC.
export function parseGraphTimestamp(timestamp: string | undefined): number | null {
  if (!timestamp) return null;
  const hasZone = /(Z|[+-]\d{2}:?\d{2})$/i.test(timestamp);
  const parsed = Date.parse(hasZone ? timestamp : `${timestamp}Z`);
  return Number.isNaN(parsed) ? null : parsed;
}

@Injectable()
export class FileFilterService {
  public isFile(item: DriveItem): boolean {
    return !item.folder && item.name.includes('.');
  }

  public filterFiles(items: readonly DriveItem[], criteria: FileFilterCriteria): DriveItem[] {
    const notBefore =
      criteria.minutesAgo === undefined ? null : Date.now() - criteria.minutesAgo * 60_000;

    return items.filter(
      (item) =>
        this.isFile(item) &&
        this.isRecentEnough(item, notBefore) &&
        this.hasAllowedFormat(item.name, criteria.fileFormats),
    );
  }

  public filterByFileNames(
    items: readonly DriveItem[],
    fileNames: string | readonly string[] | undefined,
  ): DriveItem[] {
    if (fileNames === undefined) return [...items];
    const wanted = new Set(typeof fileNames === 'string' ? [fileNames] : fileNames);
    return items.filter((item) => wanted.has(item.name));
  }

  private isRecentEnough(item: DriveItem, notBefore: number | null): boolean {
    if (notBefore === null) return true;
    const createdAt = parseGraphTimestamp(item.fileSystemInfo?.createdDateTime);
    const modifiedAt = parseGraphTimestamp(item.fileSystemInfo?.lastModifiedDateTime);
    return (
      (createdAt !== null && createdAt >= notBefore) ||
      (modifiedAt !== null && modifiedAt >= notBefore)
    );
  }

  private hasAllowedFormat(name: string, fileFormats: readonly string[] | undefined): boolean {
    if (!fileFormats || fileFormats.length === 0) return true;
    return fileFormats.some((format) => name.endsWith(`.${format}`));
  }
}
