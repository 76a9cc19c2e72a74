import { logger } from '../config/logger.config';

// Keep test output clean; assertions never depend on log lines
logger.silent = true;
