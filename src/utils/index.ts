import { logger } from './logger';
import { display } from './cli/display';
import { runWithConcurrency } from './helpers/task-pool';
import { ConfigManager } from './config';
import { SpinnerManager } from './spinner';

export { logger, display, runWithConcurrency, ConfigManager, SpinnerManager };
