/**
 * Tender Watch — Tender Alert Formatting
 *
 * Renders one tender into the message every channel sends.
 * The field list is fixed; missing values show a placeholder so the
 * message shape never changes.
 */

import type { MessageField, TenderMessage, TenderRecord } from '../types';

export const PLACEHOLDER = 'N/A';
export const ALERT_HEADING = '🔔 New Tender Alert';

function orPlaceholder(value: string | undefined): string {
  const trimmed = value?.trim();
  return trimmed ? trimmed : PLACEHOLDER;
}

/**
 * Short note about the tender documents listed on the source.
 */
export function deliverablesNote(links: readonly string[]): string {
  if (links.length === 0) return PLACEHOLDER;
  return links.length === 1 ? '1 document attached' : `${links.length} documents attached`;
}

export function messageFields(record: TenderRecord): MessageField[] {
  return [
    { label: 'Title', value: orPlaceholder(record.title) },
    { label: 'Tender No', value: orPlaceholder(record.identity) },
    { label: 'Category', value: orPlaceholder(record.category) },
    { label: 'Department', value: orPlaceholder(record.department) },
    { label: 'Closing Date', value: orPlaceholder(record.closingDate) },
    { label: 'Link', value: orPlaceholder(record.links[0]) },
    { label: 'Deliverables', value: deliverablesNote(record.links) },
  ];
}

/**
 * Format a tender into a channel-neutral message.
 */
export function formatTenderMessage(record: TenderRecord): TenderMessage {
  const fields = messageFields(record);
  const subject = `New Tender: ${record.title.trim() || record.identity}`;

  const text = [ALERT_HEADING, '', ...fields.map(field => `${field.label}: ${field.value}`)].join('\n');

  return {
    identity: record.identity,
    subject,
    heading: ALERT_HEADING,
    fields,
    text,
    html: renderTenderHtml(ALERT_HEADING, fields),
  };
}

// ============================================================
// HTML
// ============================================================

const EMAIL_STYLES = `
  body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, Arial, sans-serif; line-height: 1.6; color: #333; max-width: 640px; margin: 0 auto; padding: 20px; }
  .header { background: #0f766e; color: white; padding: 20px 24px; border-radius: 8px 8px 0 0; }
  .header h1 { margin: 0; font-size: 20px; }
  .content { background: #fff; border: 1px solid #e1e5eb; border-top: none; padding: 24px; border-radius: 0 0 8px 8px; }
  table { width: 100%; border-collapse: collapse; }
  th, td { padding: 10px; text-align: left; border-bottom: 1px solid #e2e8f0; vertical-align: top; }
  th { width: 140px; color: #475569; font-weight: 600; }
  .footer { text-align: center; padding: 16px; color: #64748b; font-size: 12px; }
`;

function renderValue(field: MessageField): string {
  if (field.label === 'Link' && /^https?:\/\//i.test(field.value)) {
    const href = escapeHtml(field.value);
    return `<a href="${href}">${href}</a>`;
  }
  return escapeHtml(field.value);
}

function renderTenderHtml(heading: string, fields: MessageField[]): string {
  const rows = fields
    .map(field => `<tr><th>${escapeHtml(field.label)}</th><td>${renderValue(field)}</td></tr>`)
    .join('\n        ');

  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(heading)}</title>
  <style>${EMAIL_STYLES}</style>
</head>
<body>
  <div class="header"><h1>${escapeHtml(heading)}</h1></div>
  <div class="content">
    <table>
        ${rows}
    </table>
  </div>
  <div class="footer">Automated tender alert</div>
</body>
</html>
`;
}

/**
 * Escape HTML special characters.
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}
