import {
  existsSync as nodeExistsSync,
  readFileSync as nodeReadFileSync,
  appendFileSync as nodeAppendFileSync,
  type PathLike,
} from 'node:fs';

/**
 * Filesystem wrapper to allow for easier testing and isolation of side effects.
 * Config loading and the operation log go through these instead of direct node:fs calls.
 */

export const fs = {
  existsSync: (path: PathLike): boolean => {
    return nodeExistsSync(path);
  },

  readFileSync: (path: PathLike, encoding: BufferEncoding): string => {
    return nodeReadFileSync(path, { encoding });
  },

  appendFileSync: (path: PathLike, data: string): void => {
    nodeAppendFileSync(path, data, { encoding: 'utf-8', mode: 0o644 });
  },
};
