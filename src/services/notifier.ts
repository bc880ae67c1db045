/**
 * Email notifier - Resend integration
 *
 * Sends price drop alerts as transactional emails.
 */

import { Resend } from 'resend';
import type { PriceDropAlert } from '../types.js';

export interface PriceAlertNotifier {
  sendPriceDropAlert(alert: PriceDropAlert): Promise<boolean>;
}

interface EmailNotifierOptions {
  apiKey?: string;
  from: string;
  now?: () => Date;
}

export class EmailNotifier implements PriceAlertNotifier {
  private apiKey?: string;
  private from: string;
  private now: () => Date;
  private client: Resend | null = null;

  constructor(options: EmailNotifierOptions) {
    this.apiKey = options.apiKey;
    this.from = options.from;
    this.now = options.now ?? (() => new Date());
  }

  async sendPriceDropAlert(alert: PriceDropAlert): Promise<boolean> {
    const resend = this.getClient();
    if (!resend) {
      console.log('[Email] RESEND_API_KEY not configured; skipping price drop email');
      return false;
    }

    const sentAt = formatUtc(this.now());

    try {
      const { data, error } = await resend.emails.send({
        from: this.from,
        to: alert.recipient,
        subject: `Price Drop Alert: ${alert.productName}`,
        text: renderText(alert, sentAt),
        html: renderHtml(alert, sentAt),
      });

      if (error) {
        console.error('[Email] Failed to send:', error.message);
        return false;
      }

      console.log('[Email] Sent successfully:', data?.id);
      return true;
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      console.error('[Email] Error:', message);
      return false;
    }
  }

  private getClient(): Resend | null {
    if (!this.apiKey) return null;
    if (!this.client) {
      this.client = new Resend(this.apiKey);
    }
    return this.client;
  }
}

export function formatUtc(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

export function renderText(alert: PriceDropAlert, sentAt: string): string {
  return [
    'Price drop detected for one of your tracked products.',
    '',
    `Product: ${alert.productName}`,
    `URL: ${alert.productUrl}`,
    `Current price: ${alert.currentPrice}`,
    `Target price: ${alert.targetPrice}`,
    `Time: ${sentAt}`,
  ].join('\n');
}

function renderHtml(alert: PriceDropAlert, sentAt: string): string {
  return `
<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
</head>
<body style="font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; line-height: 1.6; color: #333; max-width: 600px; margin: 0 auto; padding: 20px;">
  <h1 style="color: #111; font-size: 22px;">Price drop detected</h1>
  <p><strong>${escapeHtml(alert.productName)}</strong> is now at or below your target price.</p>
  <table style="border-collapse: collapse;">
    <tr><td style="padding: 4px 12px 4px 0;">Current price</td><td><strong>${alert.currentPrice}</strong></td></tr>
    <tr><td style="padding: 4px 12px 4px 0;">Target price</td><td>${alert.targetPrice}</td></tr>
    <tr><td style="padding: 4px 12px 4px 0;">Checked at</td><td>${sentAt}</td></tr>
  </table>
  <div style="text-align: center; margin: 30px 0;">
    <a href="${escapeHtml(alert.productUrl)}" style="display: inline-block; background: #111; color: #fff; text-decoration: none; padding: 14px 30px; border-radius: 6px; font-weight: 600;">View product</a>
  </div>
</body>
</html>
  `.trim();
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}
