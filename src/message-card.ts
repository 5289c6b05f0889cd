import { Temporal } from 'temporal-polyfill';
import { resolveIcon } from './icons.js';
import type { DeletionEvent, UserIdentity } from './schemas/cloudtrail-event.js';
import type { MessageCard, ResourceDeletionInfo } from './types.js';

const THEME_COLOR = 'C43532';
const RESOURCE_ID_DISPLAY_LENGTH = 22;
const EVENT_TIME_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/;

const escapeHtml = (value: string): string =>
  value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');

/**
 * Resolve who made the API call from the CloudTrail user identity
 */
const resolveDeletedBy = (userIdentity?: UserIdentity): string => {
  switch (userIdentity?.type) {
    case 'IAMUser':
      return userIdentity.userName ?? 'Unknown';
    case 'AssumedRole':
      return userIdentity.sessionContext?.sessionIssuer?.userName ?? 'Unknown';
    case 'Root':
      return 'Root User';
    default:
      return 'Unknown';
  }
};

/**
 * Format a CloudTrail `eventTime` (e.g. `2024-05-14T09:30:00Z`) as
 * `2024-05-14 09:30:00 UTC`, returning the input unchanged if it is not in
 * that exact format
 */
const formatEventTime = (eventTime: string): string => {
  if (!EVENT_TIME_PATTERN.test(eventTime)) {
    return eventTime;
  }
  try {
    return Temporal.Instant.from(eventTime)
      .toString()
      .replace('T', ' ')
      .replace('Z', ' UTC');
  } catch {
    return eventTime;
  }
};

const detailField = (label: string, value: string) => `
            <div style="flex: 1; min-width: 200px; margin-bottom: 10px;">
                <p style="margin: 0; font-size: 12px; color: #444; font-weight: 600;">${escapeHtml(label)}</p>
                <p style="margin: 5px 0 0 0; font-size: 15px; font-weight: 500; color: #222;">${escapeHtml(value)}</p>
            </div>`;

const sectionHeading = (title: string, margin: string) => `
        <h3 style="margin: ${margin}; color: #${THEME_COLOR}; font-size: 16px; border-bottom: 1px solid #eee; padding-bottom: 8px;">${title}</h3>`;

/**
 * Render the notification card for a deleted resource.
 *
 * The output only depends on the arguments, rendering the same event twice
 * yields the same card.
 *
 * @param event - The validated EventBridge event
 * @param info - The classified resource
 */
const renderMessageCard = (
  event: DeletionEvent,
  info: ResourceDeletionInfo
): MessageCard => {
  const { detail } = event;
  const awsRegion = detail.awsRegion ?? 'Unknown';
  const userType = detail.userIdentity?.type ?? 'Unknown';
  const deletedBy = resolveDeletedBy(detail.userIdentity);
  const eventTime = formatEventTime(detail.eventTime ?? 'Unknown');
  const resourceType = escapeHtml(info.resourceType);

  let text = `
<div style="font-family: 'Segoe UI', Arial, sans-serif; max-width: 600px;">
    <div style="background: linear-gradient(135deg, #${THEME_COLOR} 0%, #FF6666 100%); border-radius: 12px; padding: 20px; color: white; margin-bottom: 10px; box-shadow: 0 4px 8px rgba(0,0,0,0.1);">
        <div style="display: flex; align-items: center; justify-content: space-between;">
            <div>
                <h2 style="margin: 0; font-size: 22px; font-weight: 600;">⚠️ RESOURCE DELETED</h2>
                <p style="margin: 5px 0 0 0; font-size: 16px; opacity: 0.9;">${resourceType}</p>
            </div>
            <img src="${resolveIcon(info.resourceType)}" width="48" height="48" style="filter: brightness(0) invert(1); margin-left: 15px;" />
        </div>
        <div style="margin-top: 20px; display: flex; justify-content: space-between; align-items: flex-end;">
            <div>
                <p style="margin: 0; font-size: 14px; opacity: 0.9; font-weight: 500;">RESOURCE ID</p>
                <p style="margin: 0; font-size: 16px; font-family: 'Courier New', monospace; letter-spacing: 1px;">${escapeHtml(info.resourceId.substring(0, RESOURCE_ID_DISPLAY_LENGTH))}</p>
            </div>
            <div style="text-align: right;">
                <p style="margin: 0; font-size: 14px; opacity: 0.9; font-weight: 500;">DELETED BY</p>
                <p style="margin: 0; font-size: 16px;">${escapeHtml(deletedBy)}</p>
            </div>
        </div>
    </div>

    <div style="background: white; border-radius: 12px; padding: 20px; box-shadow: 0 2px 5px rgba(0,0,0,0.05);">${sectionHeading('📊 RESOURCE DETAILS', '0 0 15px 0')}
        <div style="display: flex; flex-wrap: wrap;">${detailField('RESOURCE NAME', info.resourceName)}${detailField('REGION', awsRegion)}${detailField('TIMESTAMP', eventTime)}${detailField('USER TYPE', userType)}
        </div>`;

  const additionalInfo = Object.entries(info.additionalInfo);
  if (additionalInfo.length > 0) {
    text += `${sectionHeading('📙 ADDITIONAL INFORMATION', '15px 0 15px 0')}
        <div style="display: flex; flex-wrap: wrap;">${additionalInfo
          .map(([key, value]) => detailField(key.toUpperCase(), value))
          .join('')}
        </div>`;
  }
  text += `
    </div>
</div>`;

  return {
    '@type': 'MessageCard',
    '@context': 'http://schema.org/extensions',
    themeColor: THEME_COLOR,
    summary: `${info.resourceType} Deleted`,
    sections: [
      {
        activityTitle: '',
        activitySubtitle: '',
        text,
        markdown: true,
      },
    ],
    potentialAction: [
      {
        '@type': 'OpenUri',
        name: '🔗 View in AWS Console',
        targets: [
          { os: 'default', uri: `https://${awsRegion}.console.aws.amazon.com` },
        ],
      },
      {
        '@type': 'OpenUri',
        name: '📚 View AWS Documentation',
        targets: [{ os: 'default', uri: 'https://docs.aws.amazon.com' }],
      },
    ],
  };
};

export { escapeHtml, formatEventTime, renderMessageCard, resolveDeletedBy };
