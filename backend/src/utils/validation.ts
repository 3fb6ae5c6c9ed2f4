export const AUTO_PORT = 'auto';

const SOURCE_NAME_REGEX = /^[A-Za-z0-9._-]+$/;
const REPO_REGEX = /^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/;
// POSIX device nodes and Windows COM ports
const DEVICE_PATH_REGEX = /^(\/dev\/[A-Za-z0-9._\/-]+|COM[0-9]{1,3})$/;

export function isValidSourceName(name: string): boolean {
  if (!name || name.length === 0 || name.length > 128) return false;
  if (name === '.' || name === '..') return false;
  return SOURCE_NAME_REGEX.test(name);
}

export function isValidRepo(repo: string): boolean {
  if (!repo || repo.length > 200) return false;
  return REPO_REGEX.test(repo);
}

export function isValidPort(port: string): boolean {
  if (port === AUTO_PORT) return true;
  if (port.includes('..')) return false;
  return DEVICE_PATH_REGEX.test(port);
}

export function isValidFilename(filename: string): boolean {
  if (!filename || filename.length === 0 || filename.length > 255) return false;
  // Reject path traversal, directory separators, null bytes
  if (filename.includes('..') || filename.includes('/') || filename.includes('\\')) return false;
  if (filename.includes('\0')) return false;
  // Reject drive letters
  if (filename.length >= 2 && filename[1] === ':') return false;
  return true;
}
