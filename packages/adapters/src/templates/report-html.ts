/**
 * HTML and plain-text renderings of the scan report
 */
import { UTCDate } from '@date-fns/utc';
import { format } from 'date-fns';
import {
  parseTimestamp,
  SnapshotStatus,
  type RunSummary,
  type SnapshotRecord,
} from '@snapshot-steward/shared';

const STYLES = `
  body { font-family: Arial, sans-serif; line-height: 1.6; color: #333; }
  .header { background: linear-gradient(135deg, #667eea 0%, #764ba2 100%); color: white; padding: 20px; border-radius: 5px; }
  .summary { background: #f4f4f4; padding: 15px; margin: 20px 0; border-radius: 5px; }
  .metric { display: inline-block; margin: 10px 20px 10px 0; }
  .metric-label { font-size: 12px; color: #666; }
  .metric-value { font-size: 24px; font-weight: bold; color: #667eea; }
  .table { width: 100%; border-collapse: collapse; margin: 20px 0; }
  .table th { background: #667eea; color: white; padding: 10px; text-align: left; }
  .table td { padding: 8px; border-bottom: 1px solid #ddd; }
  .status-deleted { color: #e74c3c; font-weight: bold; }
  .status-archived { color: #f39c12; font-weight: bold; }
  .status-active { color: #27ae60; }
  .footer { margin-top: 30px; padding-top: 20px; border-top: 1px solid #ddd; font-size: 12px; color: #666; }
`;

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function formatUsd(amount: number): string {
  return `$${amount.toFixed(2)}`;
}

export function formatScanDate(scanDate: string): string {
  return format(new UTCDate(parseTimestamp(scanDate).getTime()), "MMMM dd, yyyy 'at' HH:mm 'UTC'");
}

export function buildReportSubject(summary: RunSummary): string {
  return (
    `Snapshot Report: ${summary.oldSnapshotsCount} Old Snapshots Found | ` +
    `Savings: ${formatUsd(summary.estimatedSavingsUsd)}/mo`
  );
}

/**
 * Snapshots listed in the detail table: deleted first, then archived, then
 * old ones that are still active
 */
export function selectReportedSnapshots(
  summary: RunSummary,
  records: readonly SnapshotRecord[]
): SnapshotRecord[] {
  const deleted = records.filter((r) => r.status === SnapshotStatus.DELETED);
  const archived = records.filter((r) => r.status === SnapshotStatus.ARCHIVED);
  const oldActive = records.filter(
    (r) => r.status === SnapshotStatus.ACTIVE && r.ageDays > summary.retentionDays
  );
  return [...deleted, ...archived, ...oldActive];
}

function metric(label: string, value: string | number, color?: string): string {
  const style = color ? ` style="color: ${color};"` : '';
  return `
      <div class="metric">
        <div class="metric-label">${escapeHtml(label)}</div>
        <div class="metric-value"${style}>${escapeHtml(String(value))}</div>
      </div>`;
}

function snapshotRow(record: SnapshotRecord): string {
  const cells = [
    record.snapshotId,
    record.volumeId,
    record.region,
    String(record.ageDays),
    String(record.sizeGiB),
    formatUsd(record.estimatedCost),
  ]
    .map((cell) => `<td>${escapeHtml(cell)}</td>`)
    .join('');

  return `
        <tr>${cells}<td class="status-${record.status.toLowerCase()}">${record.status}</td></tr>`;
}

function detailTable(rows: SnapshotRecord[]): string {
  if (rows.length === 0) {
    return '';
  }

  return `
    <h2>Detailed Snapshot List</h2>
    <table class="table">
      <thead>
        <tr>
          <th>Snapshot ID</th>
          <th>Volume ID</th>
          <th>Region</th>
          <th>Age (days)</th>
          <th>Size (GB)</th>
          <th>Cost/mo</th>
          <th>Status</th>
        </tr>
      </thead>
      <tbody>${rows.map(snapshotRow).join('')}
      </tbody>
    </table>`;
}

export function buildHtmlReport(summary: RunSummary, records: readonly SnapshotRecord[]): string {
  const enabled = (flag: boolean) => (flag ? 'Enabled' : 'Disabled');

  return `<html>
  <head>
    <style>${STYLES}</style>
  </head>
  <body>
    <div class="header">
      <h1>EBS Snapshot Expiry Report</h1>
      <p>Scan Date: ${formatScanDate(summary.scanDate)}</p>
    </div>

    <div class="summary">
      <h2>Executive Summary</h2>${[
        metric('Total Snapshots', summary.totalSnapshots),
        metric(
          `Old Snapshots (>${summary.retentionDays} days)`,
          summary.oldSnapshotsCount,
          '#e74c3c'
        ),
        metric('Deleted', summary.deletedCount, '#e74c3c'),
        metric('Archived', summary.archivedCount, '#f39c12'),
        metric('Estimated Savings', `${formatUsd(summary.estimatedSavingsUsd)}/mo`, '#27ae60'),
      ].join('')}
    </div>

    <h2>Cost Analysis</h2>
    <ul>
      <li><strong>Total Monthly Cost:</strong> ${formatUsd(summary.totalEstimatedCostUsd)}</li>
      <li><strong>Old Snapshots Cost:</strong> ${formatUsd(summary.oldSnapshotsCostUsd)}</li>
      <li><strong>Potential Savings:</strong> ${formatUsd(summary.estimatedSavingsUsd)}</li>
    </ul>

    <h2>Configuration</h2>
    <ul>
      <li><strong>Retention Policy:</strong> ${summary.retentionDays} days</li>
      <li><strong>Regions Scanned:</strong> ${escapeHtml(summary.regionsScanned.join(', '))}</li>
      <li><strong>Auto-Delete:</strong> ${enabled(summary.autoDeleteEnabled)}</li>
      <li><strong>Cold Archive:</strong> ${enabled(summary.coldArchiveEnabled)}</li>
    </ul>
${detailTable(selectReportedSnapshots(summary, records))}
    <div class="footer">
      <p>This is an automated report from Snapshot Steward.</p>
      <p>For questions or issues, contact your AWS administrator.</p>
    </div>
  </body>
</html>
`;
}
