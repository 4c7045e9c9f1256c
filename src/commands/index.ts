import { runCommand } from './run/run';
import { annotateCommand } from './annotate/annotate';
import { configCommand } from './config/config';

export { runCommand, annotateCommand, configCommand };
