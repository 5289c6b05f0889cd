import iconData from './assets/icons.json' with { type: 'json' };
import type { ResourceType } from './types.js';

const DEFAULT_ICON =
  'https://d1.awsstatic.com/webteam/architecture-icons/q42023/Res_AWS-Logo_48.svg';

// AWS Architecture Icons as base64 SVG data URLs
const icons = new Map<string, string>(Object.entries(iconData));

/**
 * Get the service icon for a resource type, or the AWS logo for anything
 * without a dedicated icon
 */
const resolveIcon = (resourceType: ResourceType): string =>
  icons.get(resourceType) ?? DEFAULT_ICON;

export { DEFAULT_ICON, resolveIcon };
