/**
 * Report template Tests
 */

import { describe, it, expect } from 'vitest';
import { SnapshotStatus } from '@snapshot-steward/shared';
import {
  buildHtmlReport,
  buildReportSubject,
  escapeHtml,
  formatScanDate,
  formatUsd,
  selectReportedSnapshots,
} from '../src/templates/report-html';
import { buildRecord, buildSummary } from './fixtures';

describe('report formatting', () => {
  it('should escape markup characters', () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe(
      '&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;'
    );
  });

  it('should format dollar amounts with two decimals', () => {
    expect(formatUsd(5)).toBe('$5.00');
    expect(formatUsd(1234.5)).toBe('$1234.50');
  });

  it('should format the scan date in UTC', () => {
    expect(formatScanDate('2026-06-01T06:00:00.000Z')).toBe('June 01, 2026 at 06:00 UTC');
  });

  it('should put the old count and savings in the subject', () => {
    expect(buildReportSubject(buildSummary({ oldSnapshotsCount: 3, estimatedSavingsUsd: 12.5 }))).toBe(
      'Snapshot Report: 3 Old Snapshots Found | Savings: $12.50/mo'
    );
  });
});

describe('selectReportedSnapshots', () => {
  it('should list deleted, then archived, then old active snapshots', () => {
    const oldActive = buildRecord({ snapshotId: 'snap-old' });
    const young = buildRecord({ snapshotId: 'snap-young', ageDays: 5 });
    const deleted = buildRecord({ snapshotId: 'snap-deleted', status: SnapshotStatus.DELETED });
    const archived = buildRecord({ snapshotId: 'snap-archived', status: SnapshotStatus.ARCHIVED });

    const rows = selectReportedSnapshots(buildSummary(), [oldActive, young, deleted, archived]);

    expect(rows.map((row) => row.snapshotId)).toEqual([
      'snap-deleted',
      'snap-archived',
      'snap-old',
    ]);
  });
});

describe('buildHtmlReport', () => {
  it('should render the summary, configuration and escaped rows', () => {
    const html = buildHtmlReport(buildSummary({ autoDeleteEnabled: true }), [
      buildRecord({ volumeId: '<vol>' }),
    ]);

    expect(html).toContain('<p>Scan Date: June 01, 2026 at 06:00 UTC</p>');
    expect(html).toContain('<li><strong>Total Monthly Cost:</strong> $5.40</li>');
    expect(html).toContain('<li><strong>Auto-Delete:</strong> Enabled</li>');
    expect(html).toContain('<li><strong>Cold Archive:</strong> Disabled</li>');
    expect(html).toContain('<h2>Detailed Snapshot List</h2>');
    expect(html).toContain('<td>&lt;vol&gt;</td>');
    expect(html).toContain('<td class="status-active">ACTIVE</td>');
  });

  it('should omit the detail table when nothing is old', () => {
    const html = buildHtmlReport(buildSummary({ oldSnapshotsCount: 0 }), [
      buildRecord({ ageDays: 10 }),
    ]);

    expect(html).not.toContain('Detailed Snapshot List');
  });
});
