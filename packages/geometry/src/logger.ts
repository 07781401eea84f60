import { logger as rootLogger } from '@quadrant/core';

export const logger = rootLogger.child('geometry');
