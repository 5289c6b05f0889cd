import { Logger } from '@aws-lambda-powertools/logger';

const logger = new Logger();

export { logger };
