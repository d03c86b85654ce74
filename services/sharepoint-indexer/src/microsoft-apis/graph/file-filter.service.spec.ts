import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FileFilterService, parseGraphTimestamp } from './file-filter.service';
import type { DriveItem } from './types/sharepoint.types';

const file = (name: string, created: string, modified: string): DriveItem => ({
  id: name,
  name,
  file: { mimeType: 'application/octet-stream' },
  fileSystemInfo: { createdDateTime: created, lastModifiedDateTime: modified },
});

describe('FileFilterService', () => {
  const service = new FileFilterService();

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-05-01T12:00:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('treats folders and names without an extension as non-files', () => {
    expect(service.isFile({ id: '1', name: 'Archive', folder: { childCount: 2 } })).toBe(false);
    expect(service.isFile({ id: '2', name: 'README' })).toBe(false);
    expect(service.isFile({ id: '3', name: 'a.docx.folder', folder: {} })).toBe(false);
    expect(service.isFile({ id: '4', name: 'plan.docx' })).toBe(true);
  });

  it('keeps files created or modified within the window', () => {
    const items = [
      file('old.pdf', '2024-04-01T00:00:00Z', '2024-04-01T00:00:00Z'),
      file('created.pdf', '2024-05-01T11:30:00Z', '2024-04-01T00:00:00Z'),
      file('modified.pdf', '2024-04-01T00:00:00Z', '2024-05-01T11:00:00Z'),
    ];

    const result = service.filterFiles(items, { minutesAgo: 60 });

    expect(result.map((item) => item.name)).toEqual(['created.pdf', 'modified.pdf']);
  });

  it('reads timestamps without a zone as UTC', () => {
    const items = [file('local.pdf', '2024-05-01T11:10:00', '2024-05-01T11:10:00')];

    expect(service.filterFiles(items, { minutesAgo: 60 })).toHaveLength(1);
    expect(service.filterFiles(items, { minutesAgo: 30 })).toHaveLength(0);
  });

  it('matches file formats by extension suffix', () => {
    const items = [
      file('a.pdf', '2024-01-01T00:00:00Z', '2024-01-01T00:00:00Z'),
      file('b.docx', '2024-01-01T00:00:00Z', '2024-01-01T00:00:00Z'),
      file('c.xlsx', '2024-01-01T00:00:00Z', '2024-01-01T00:00:00Z'),
    ];

    expect(service.filterFiles(items, { fileFormats: ['pdf', 'docx'] }).map((i) => i.name)).toEqual([
      'a.pdf',
      'b.docx',
    ]);
    expect(service.filterFiles(items, { fileFormats: [] })).toHaveLength(3);
  });

  it('filters by a single file name or a list of names', () => {
    const items = [
      file('a.pdf', '2024-01-01T00:00:00Z', '2024-01-01T00:00:00Z'),
      file('b.pdf', '2024-01-01T00:00:00Z', '2024-01-01T00:00:00Z'),
    ];

    expect(service.filterByFileNames(items, 'b.pdf').map((i) => i.name)).toEqual(['b.pdf']);
    expect(service.filterByFileNames(items, ['a.pdf', 'x.pdf']).map((i) => i.name)).toEqual([
      'a.pdf',
    ]);
    expect(service.filterByFileNames(items, undefined)).toHaveLength(2);
  });
});

describe('parseGraphTimestamp', () => {
  it('keeps explicit offsets', () => {
    expect(parseGraphTimestamp('2024-05-01T12:00:00+02:00')).toBe(Date.parse('2024-05-01T10:00:00Z'));
  });

  it('returns null for missing or invalid values', () => {
    expect(parseGraphTimestamp(undefined)).toBeNull();
    expect(parseGraphTimestamp('yesterday')).toBeNull();
  });
});
