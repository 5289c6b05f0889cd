import { createDeletionNotifier } from './deletion-notifier.js';
import { globalRules } from './rules/global.js';

export const handler = createDeletionNotifier({ rules: globalRules });
