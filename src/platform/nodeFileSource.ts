import { access, readFile } from 'node:fs/promises';
import { constants } from 'node:fs';
import type { FileSource } from './fileUploader';

export const nodeFileSource: FileSource = {
  exists: async (path) => {
    try {
      await access(path, constants.R_OK);
      return true;
    } catch {
      return false;
    }
  },
  read: (path) => readFile(path),
};
