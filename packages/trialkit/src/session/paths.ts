import * as fs from 'node:fs';
import * as path from 'node:path';

/** Session number → folder name, e.g. 3 → "S003". */
export function sessionNumToName(num: number): string {
  return `S${String(num).padStart(3, '0')}`;
}

export interface SessionPaths {
  experimentPath: string;
  participantPath: string;
  fullPath: string;
  folderName: string;
  /** `experiment/ppid/S###`, always with forward slashes. */
  relativePath: string;
}

export function sessionPaths(
  basePath: string,
  experiment: string,
  ppid: string,
  sessionNumber: number,
): SessionPaths {
  const folderName = sessionNumToName(sessionNumber);
  const experimentPath = path.join(path.resolve(basePath), experiment);
  const participantPath = path.join(experimentPath, ppid);
  return {
    experimentPath,
    participantPath,
    fullPath: path.join(participantPath, folderName),
    folderName,
    relativePath: [experiment, ppid, folderName].join('/'),
  };
}

/**
 * Checks whether a session folder already exists for this participant.
 * Derived purely from `basePath/experiment/ppid/S###`.
 */
export function sessionExists(
  experiment: string,
  ppid: string,
  basePath: string,
  sessionNumber: number,
): boolean {
  const { fullPath } = sessionPaths(basePath, experiment, ppid, sessionNumber);
  try {
    return fs.statSync(fullPath).isDirectory();
  } catch {
    return false;
  }
}
