import { describe, it, expect } from 'vitest';
import { describeSettings } from '../../src/commands/config.js';
import { loadConfig } from '../../src/config.js';

const config = loadConfig({
  DISCORD_TOKEN: 'test-token',
  DISCORD_CLIENT_ID: '1234567890',
  ALERT_RECIPIENT_EMAIL: 'default@example.com',
  CHECK_INTERVAL_MINUTES: '30',
});

describe('describeSettings', () => {
  it('labels the .env defaults when nothing is overridden', () => {
    const lines = describeSettings({ alertRecipient: null, checkIntervalMinutes: null }, config);

    expect(lines).toContain('- Alert Recipient: default@example.com (default from .env)');
    expect(lines).toContain('- Check Interval (minutes): 30 min (default from .env)');
    expect(lines).toContain('- Email delivery: ❌ RESEND_API_KEY not set');
  });

  it('shows runtime overrides', () => {
    const lines = describeSettings({ alertRecipient: 'user@example.com', checkIntervalMinutes: 5 }, config);

    expect(lines).toContain('- Alert Recipient: user@example.com');
    expect(lines).toContain('- Check Interval (minutes): 5 min');
  });
});
