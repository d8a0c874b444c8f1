export type AuditCategory = 'authentication' | 'security' | 'user_management';

export interface AuditEvent {
  event: string;
  username?: string;
  [key: string]: unknown;
}

export interface AuditEntry extends AuditEvent {
  category: AuditCategory;
  timestamp: number;
}

const SENSITIVE_KEYS = new Set(['password', 'newPassword', 'passwordHash', 'code', 'codeDigest']);

export class AuditLogger {
  constructor(
    private readonly enabled = true,
    private readonly clock: () => number = Date.now
  ) {}

  logAuthenticationEvent(event: AuditEvent): void {
    this.write('authentication', event, false);
  }

  logSecurityEvent(event: AuditEvent): void {
    this.write('security', event, true);
  }

  logUserManagementEvent(event: AuditEvent): void {
    this.write('user_management', event, false);
  }

  format(category: AuditCategory, event: AuditEvent): string {
    const entry: AuditEntry = {
      ...this.sanitize(event),
      event: event.event,
      category,
      timestamp: this.clock()
    };
    return JSON.stringify(entry);
  }

  private sanitize(event: AuditEvent): AuditEvent {
    const clean: AuditEvent = { event: event.event };
    for (const [key, value] of Object.entries(event)) {
      clean[key] = SENSITIVE_KEYS.has(key) ? '[REDACTED]' : value;
    }
    return clean;
  }

  private write(category: AuditCategory, event: AuditEvent, warn: boolean): void {
    if (!this.enabled) {
      return;
    }

    const line = this.format(category, event);
    if (warn) {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}
