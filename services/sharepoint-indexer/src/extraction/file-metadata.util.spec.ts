import { describe, expect, it } from 'vitest';
import { extractFileMetadata, toUtcTimestamp } from './file-metadata.util';

describe('toUtcTimestamp', () => {
  it('appends Z when the zone is missing', () => {
    expect(toUtcTimestamp('2024-03-01T08:15:00')).toBe('2024-03-01T08:15:00Z');
    expect(toUtcTimestamp('2024-03-01T08:15:00Z')).toBe('2024-03-01T08:15:00Z');
  });

  it('returns null for missing values', () => {
    expect(toUtcTimestamp(undefined)).toBeNull();
    expect(toUtcTimestamp('')).toBeNull();
  });
});

describe('extractFileMetadata', () => {
  it('maps a drive item to file metadata', () => {
    const metadata = extractFileMetadata({
      id: 'item-1',
      name: 'Handbook.docx',
      webUrl: 'https://contoso.sharepoint.com/sites/hr/Shared%20Documents/Handbook.docx',
      size: 2048,
      createdBy: { user: { displayName: 'Alex Doe' } },
      lastModifiedBy: { user: { displayName: 'Sam Roe' } },
      fileSystemInfo: {
        createdDateTime: '2024-01-10T09:00:00',
        lastModifiedDateTime: '2024-02-11T10:30:00Z',
      },
    });

    expect(metadata).toEqual({
      id: 'item-1',
      source: 'https://contoso.sharepoint.com/sites/hr/Shared%20Documents/Handbook.docx',
      name: 'Handbook.docx',
      size: 2048,
      createdBy: 'Alex Doe',
      lastModifiedBy: 'Sam Roe',
      createdAt: '2024-01-10T09:00:00Z',
      lastModifiedAt: '2024-02-11T10:30:00Z',
    });
  });

  it('uses null for absent fields', () => {
    expect(extractFileMetadata({ id: 'item-2', name: 'a.pdf' })).toEqual({
      id: 'item-2',
      source: null,
      name: 'a.pdf',
      size: null,
      createdBy: null,
      lastModifiedBy: null,
      createdAt: null,
      lastModifiedAt: null,
    });
  });
});
