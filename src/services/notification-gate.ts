export const DEFAULT_COOLDOWN_MINUTES = 60;

interface NotificationGateOptions {
  cooldownMs?: number;
  now?: () => number;
}

/**
 * Per (recipient, product URL) cooldown. State lives in memory for the
 * lifetime of the process and is not shared between workers.
 */
export class NotificationGate {
  private lastSent = new Map<string, number>();
  private cooldownMs: number;
  private now: () => number;

  constructor(options: NotificationGateOptions = {}) {
    this.cooldownMs = options.cooldownMs ?? DEFAULT_COOLDOWN_MINUTES * 60 * 1000;
    this.now = options.now ?? Date.now;
  }

  shouldSend(recipient: string, productUrl: string): boolean {
    const last = this.lastSent.get(NotificationGate.key(recipient, productUrl));
    if (last === undefined) return true;
    return this.now() - last >= this.cooldownMs;
  }

  recordSent(recipient: string, productUrl: string, at: number = this.now()): void {
    this.lastSent.set(NotificationGate.key(recipient, productUrl), at);
  }

  static key(recipient: string, productUrl: string): string {
    return `${recipient}\u0000${productUrl}`;
  }
}
