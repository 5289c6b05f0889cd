import { createDeletionNotifier } from './deletion-notifier.js';
import { regionalRules } from './rules/regional.js';

export const handler = createDeletionNotifier({ rules: regionalRules });
