/**
 * Source file discovery and reading
 *
 * Input files are named `<ChannelPrefix>_<reporttype>_<YYYY-MM-DD>.csv`,
 * e.g. `Amazon_fba_2025-01-31.csv`. Anything else in the input directory is
 * ignored.
 */

import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import { isValid, parse } from 'date-fns';
import { channelFromPrefix, isSourceReportType, type SourceFile } from '@channel-recon/catalog';
import { silentLogger, type Logger } from '../logger';

const SOURCE_FILENAME = /^([a-z]+)_([a-z]+)_(\d{4}-\d{2}-\d{2})\.csv$/i;

/**
 * Parse a source file name, or null when it does not follow the convention
 */
export function parseSourceFilename(fileName: string, directory: string = ''): SourceFile | null {
  const match = SOURCE_FILENAME.exec(fileName);
  if (!match) return null;

  const [, prefix, type, date] = match;
  const channel = channelFromPrefix(prefix);
  const reportType = type.toLowerCase();
  if (!channel || !isSourceReportType(reportType)) return null;

  if (!isValid(parse(date, 'yyyy-MM-dd', new Date()))) return null;

  return { channel, reportType, fileDate: date, fileName, path: join(directory, fileName) };
}

function isMissingDirectory(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * List the recognised source files in a directory, sorted by name.
 * A missing directory yields no files.
 */
export async function discoverSourceFiles(
  directory: string,
  logger: Logger = silentLogger
): Promise<SourceFile[]> {
  let entries: string[];
  try {
    entries = await readdir(directory);
  } catch (err) {
    if (isMissingDirectory(err)) {
      logger.warn(`Input directory ${directory} does not exist`);
      return [];
    }
    throw err;
  }

  const files: SourceFile[] = [];
  for (const entry of [...entries].sort()) {
    const file = parseSourceFilename(entry, directory);
    if (file) {
      files.push(file);
    } else {
      logger.debug(`Ignoring ${entry}: not a recognised source file name`);
    }
  }

  logger.info(`Discovered ${files.length} source files in ${directory}`);
  return files;
}

/**
 * Read a source file as UTF-8, aborting after `timeoutMs`
 */
export async function readSourceFile(file: SourceFile, timeoutMs: number): Promise<string> {
  try {
    return await readFile(file.path, { encoding: 'utf8', signal: AbortSignal.timeout(timeoutMs) });
  } catch (err) {
    if (err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError')) {
      throw new Error(`Timed out reading ${file.fileName} after ${timeoutMs}ms`);
    }
    throw err;
  }
}
