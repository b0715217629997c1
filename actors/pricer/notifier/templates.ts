import { PricerUtils } from '../pricerUtils';
import type { ChangeEvent } from '../types';

export const ALERT_SUBJECT = 'Price Watcher Alert: Price Changes Detected';

export interface RenderedEmail {
  subject: string;
  text: string;
  html: string;
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

function describeChange(event: ChangeEvent): string {
  switch (event.kind) {
    case 'price':
      return `Price changed: ${PricerUtils.formatPrice(event.oldValue)} -> ${PricerUtils.formatPrice(event.newValue)}`;
    case 'url':
      return `URL changed: ${event.oldValue} -> ${event.newValue}`;
  }
}

function textBlock(event: ChangeEvent): string {
  return [
    `Item: ${event.itemName}`,
    `URL: ${event.itemUrl}`,
    describeChange(event),
    `Detected at: ${event.timestamp}`,
  ].join('\n');
}

function htmlBlock(event: ChangeEvent): string {
  const name = escapeHtml(event.itemName);
  const url = escapeHtml(event.itemUrl);
  return `
<div style="border: 1px solid #e5e7eb; border-radius: 6px; padding: 16px; margin-bottom: 16px;">
  <h3 style="margin: 0 0 8px 0;">${name}</h3>
  <p style="margin: 4px 0;"><a href="${url}">${url}</a></p>
  <p style="margin: 4px 0; font-weight: 600;">${escapeHtml(describeChange(event))}</p>
  <p style="margin: 4px 0; color: #666; font-size: 12px;">Detected at ${escapeHtml(event.timestamp)}</p>
</div>`.trim();
}

/**
 * Plain-text and HTML bodies listing every change, one block per event
 */
export function renderChangeEmail(
  events: readonly ChangeEvent[]
): RenderedEmail {
  const intro = `${events.length} change(s) detected on your tracked items.`;

  const text = [intro, ...events.map(textBlock)].join('\n\n');

  const html = `
<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
</head>
<body style="font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; line-height: 1.6; color: #333; max-width: 600px; margin: 0 auto; padding: 20px;">
  <h2 style="margin-top: 0;">${escapeHtml(ALERT_SUBJECT)}</h2>
  <p>${escapeHtml(intro)}</p>
  ${events.map(htmlBlock).join('\n  ')}
</body>
</html>`.trim();

  return { subject: ALERT_SUBJECT, text, html };
}
