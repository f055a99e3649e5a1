import { makeLogger } from '@tilestep/logger';

export const SERVICE_NAME = 'runner';

export const logger = makeLogger(SERVICE_NAME);
