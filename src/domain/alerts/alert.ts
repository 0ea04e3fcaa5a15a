export type AlertSeverity = 'CRITICAL' | 'WARNING' | 'INFO';

export const SEVERITY_RANK: Readonly<Record<AlertSeverity, number>> = {
  CRITICAL: 3,
  WARNING: 2,
  INFO: 1,
};

export interface Alert {
  readonly kind: string;
  readonly severity: AlertSeverity;
  /** What the alert is about: an account id, an account pair, or "portfolio". */
  readonly subject: string;
  readonly message: string;
  readonly triggeredAt: Date;
}

/**
 * Most severe first; kind and subject break ties so the order is stable.
 */
export function compareAlerts(a: Alert, b: Alert): number {
  return (
    SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity] ||
    a.kind.localeCompare(b.kind) ||
    a.subject.localeCompare(b.subject)
  );
}

/**
 * Replace `{name}` placeholders; unknown placeholders are left as written.
 */
export function renderTemplate(
  template: string,
  fields: Readonly<Record<string, string | number>>
): string {
  return template.replace(/\{(\w+)\}/g, (placeholder, name: string) => {
    const value = fields[name];
    return value === undefined ? placeholder : String(value);
  });
}
