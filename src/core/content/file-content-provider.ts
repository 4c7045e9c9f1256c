import fs from 'fs-extra';
import path from 'path';
import { FileNotFoundException, FileReadException, toError } from '@/core/exceptions';

export enum Revision {
  OLD = 'old',
  NEW = 'new',
}

/**
 * Supplies the full text of a file at one side of the diff.
 */
export interface FileContentProvider {
  getContent(filePath: string, revision: Revision): Promise<string>;
}

/**
 * Contents held in memory, one map per revision.
 */
export class InMemoryContentProvider implements FileContentProvider {
  constructor(
    private readonly oldFileContents: ReadonlyMap<string, string>,
    private readonly newFileContents: ReadonlyMap<string, string>
  ) {}

  async getContent(filePath: string, revision: Revision): Promise<string> {
    const contents = revision === Revision.OLD ? this.oldFileContents : this.newFileContents;
    const content = contents.get(filePath);
    if (content === undefined) {
      throw new FileNotFoundException(filePath, revision);
    }
    return content;
  }
}

/**
 * Contents read from two checkouts of the repository, one per revision.
 * Paths that would resolve outside their checkout are refused.
 */
export class DirectoryContentProvider implements FileContentProvider {
  private readonly oldRoot: string;
  private readonly newRoot: string;

  constructor(oldRoot: string, newRoot: string) {
    this.oldRoot = path.resolve(oldRoot);
    this.newRoot = path.resolve(newRoot);
  }

  async getContent(filePath: string, revision: Revision): Promise<string> {
    const root = revision === Revision.OLD ? this.oldRoot : this.newRoot;
    const fullPath = path.resolve(root, filePath);

    if (path.relative(root, fullPath).startsWith('..')) {
      throw new FileNotFoundException(filePath, revision);
    }

    if (!(await fs.pathExists(fullPath))) {
      throw new FileNotFoundException(filePath, revision);
    }

    try {
      return await fs.readFile(fullPath, 'utf8');
    } catch (error) {
      throw new FileReadException(filePath, revision, toError(error));
    }
  }
}
