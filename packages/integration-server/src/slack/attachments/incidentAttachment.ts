import type { AttachmentPayload, AttachmentTheme } from './types';

export type IncidentStatusLabel = 'Resolved' | 'Warning' | 'Critical';

export type AlertRuleTriggerLabel = 'critical' | 'warning';

export type IncidentAlertAction = {
  integrationId: string;
  /** Slack channel id stored when the rule was saved. */
  targetIdentifier: string;
  triggerLabel: AlertRuleTriggerLabel;
};

export type IncidentSnapshot = {
  id: string;
  /** Organization-scoped incident number. */
  identifier: number;
  organization: { id: string; slug: string };
  status: 'open' | 'closed';
  dateStarted: Date;
  alertRule: {
    id: string;
    name: string;
    /** e.g. `count()` or `p95(transaction.duration)` */
    aggregate: string;
    timeWindowMinutes: number;
  };
  /** Last value seen by the metric pipeline. */
  currentMetricValue: number | null;
};

export type IncidentAttachmentInfo = {
  title: string;
  titleLink: string;
  text: string;
  ts: Date;
  logoUrl: string;
  status: IncidentStatusLabel;
};

function incidentStatus(incident: IncidentSnapshot, action: IncidentAlertAction): IncidentStatusLabel {
  if (incident.status === 'closed') return 'Resolved';
  return action.triggerLabel === 'critical' ? 'Critical' : 'Warning';
}

function formatMetricValue(value: number | null): string {
  if (value === null) return '-';
  return Number.isInteger(value) ? String(value) : value.toFixed(2);
}

export function incidentAttachmentInfo(
  theme: AttachmentTheme,
  incident: IncidentSnapshot,
  action: IncidentAlertAction,
  metricValue?: number | null,
): IncidentAttachmentInfo {
  const status = incidentStatus(incident, action);
  const value = metricValue ?? incident.currentMetricValue;
  const { alertRule } = incident;
  const query = new URLSearchParams({ alert: String(incident.identifier), referrer: 'slack' });
  return {
    title: `${status}: ${alertRule.name}`,
    titleLink: `${theme.baseUrl}/organizations/${incident.organization.slug}/alerts/rules/details/${alertRule.id}/?${query.toString()}`,
    text: `${formatMetricValue(value)} ${alertRule.aggregate} in the last ${alertRule.timeWindowMinutes} minutes`,
    ts: incident.dateStarted,
    logoUrl: theme.logoUrl,
    status,
  };
}

export function buildIncidentAttachment(
  theme: AttachmentTheme,
  action: IncidentAlertAction,
  incident: IncidentSnapshot,
  metricValue?: number | null,
): AttachmentPayload {
  const data = incidentAttachmentInfo(theme, incident, action, metricValue);
  const colors: Record<IncidentStatusLabel, string> = {
    Resolved: theme.resolvedColor,
    Warning: theme.levelToColor.warning,
    Critical: theme.levelToColor.fatal,
  };
  const startedAt = Math.round(data.ts.getTime() / 1000);

  return {
    fallback: data.title,
    title: data.title,
    title_link: data.titleLink,
    text: data.text,
    fields: [],
    mrkdwn_in: ['text'],
    footer_icon: data.logoUrl,
    footer: `<!date^${startedAt}^Incident - Started {date_pretty} at {time} | Incident>`,
    color: colors[data.status],
    actions: [],
  };
}
