import { logger } from '@/utils/logger';

logger.level = 'silent';
