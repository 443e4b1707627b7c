import { stat } from 'fs/promises';
import { hasErrorCode } from '../core/errors.js';

/**
 * Missing paths (or a file where a directory was expected) read as absent;
 * any other failure propagates.
 */
export const isAbsent = (error: unknown): boolean =>
  hasErrorCode(error, 'ENOENT', 'ENOTDIR');

export const isFile = async (filePath: string): Promise<boolean> => {
  try {
    return (await stat(filePath)).isFile();
  } catch (error) {
    if (isAbsent(error)) return false;
    throw error;
  }
};

export const pathExists = async (targetPath: string): Promise<boolean> => {
  try {
    await stat(targetPath);
    return true;
  } catch (error) {
    if (isAbsent(error)) return false;
    throw error;
  }
};
