import { describe, expect, it } from 'vitest';
import {
  buildIncidentAttachment,
  incidentAttachmentInfo,
  type IncidentAlertAction,
  type IncidentSnapshot,
} from '../src/slack/attachments/incidentAttachment';
import { createAttachmentTheme } from '../src/slack/attachments/types';

const theme = createAttachmentTheme('https://errors.example.com');
const startedMs = Date.UTC(2024, 0, 15, 8, 30, 0);

const action: IncidentAlertAction = { integrationId: 'int-1', targetIdentifier: 'C123', triggerLabel: 'critical' };

const incident = (overrides: Partial<IncidentSnapshot> = {}): IncidentSnapshot => ({
  id: 'inc-1',
  identifier: 12,
  organization: { id: 'org-1', slug: 'acme' },
  status: 'open',
  dateStarted: new Date(startedMs),
  alertRule: { id: '77', name: 'p95 latency', aggregate: 'p95(transaction.duration)', timeWindowMinutes: 10 },
  currentMetricValue: 312.5,
  ...overrides,
});

describe('buildIncidentAttachment', () => {
  it('renders an open critical incident', () => {
    expect(buildIncidentAttachment(theme, action, incident())).toEqual({
      fallback: 'Critical: p95 latency',
      title: 'Critical: p95 latency',
      title_link: 'https://errors.example.com/organizations/acme/alerts/rules/details/77/?alert=12&referrer=slack',
      text: '312.50 p95(transaction.duration) in the last 10 minutes',
      fields: [],
      mrkdwn_in: ['text'],
      footer_icon: 'https://errors.example.com/_static/images/email-avatar.png',
      footer: `<!date^${startedMs / 1000}^Incident - Started {date_pretty} at {time} | Incident>`,
      color: '#FA4747',
      actions: [],
    });
  });

  it('colors warnings and resolved incidents', () => {
    expect(buildIncidentAttachment(theme, { ...action, triggerLabel: 'warning' }, incident()).color).toBe('#FFC227');

    const resolved = buildIncidentAttachment(theme, action, incident({ status: 'closed' }));
    expect(resolved.title).toBe('Resolved: p95 latency');
    expect(resolved.color).toBe('#4dc771');
  });
});

describe('incidentAttachmentInfo', () => {
  it('prefers the explicit metric value and prints integers as is', () => {
    expect(incidentAttachmentInfo(theme, incident(), action, 40).text).toBe('40 p95(transaction.duration) in the last 10 minutes');
  });

  it('prints a dash when no value is known', () => {
    expect(incidentAttachmentInfo(theme, incident({ currentMetricValue: null }), action).text).toBe(
      '- p95(transaction.duration) in the last 10 minutes',
    );
  });
});
