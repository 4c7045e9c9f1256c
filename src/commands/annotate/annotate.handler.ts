import {
  classifyLines,
  type ClassifiedFile,
} from '@/core/effective-diff/line-classifier';
import type { PipelineFailure } from '@/core/effective-diff/types';
import { runEffectiveDiff, type RunHandlerOptions } from '../run/run.handler';

export interface AnnotateOutcome {
  files: ClassifiedFile[];
  failures: readonly PipelineFailure[];
}

/**
 * Run the pipeline and label every line of the original patch with what
 * became of it.
 */
export const annotatePatch = async (
  patchPath: string,
  options: Omit<RunHandlerOptions, 'output'>
): Promise<AnnotateOutcome> => {
  const { gitDiff, result } = await runEffectiveDiff(patchPath, options);
  return {
    files: classifyLines(gitDiff, result.moveReport),
    failures: result.failures,
  };
};
