/**
 * Environment Detector
 * Looks for a data volume shared with the remote service and reports what it holds.
 * Read-only. Each sub-check settles on its own outcome, so one failing check
 * (an unreadable folder, a broken catalog) leaves the others intact.
 */

import type { Dirent } from 'node:fs';
import { readdir, readFile, stat } from 'node:fs/promises';
import path from 'node:path';
import { getDataRoot } from '../config';
import { DATA_LAYOUT } from '../constants';
import { CatalogSchema } from '../schemas/setup.schemas';
import type { DetectionResult, SubCheck } from '../types';
import { safeParse } from '../utils/validation';
import { getErrorMessage, isMissingPathError } from './errors';
import { createLogger } from './logger';

const logger = createLogger('environment-detector');

/** Lists one directory with entry types */
export type DirectoryLister = (dir: string) => Promise<Dirent[]>;

export interface EnvironmentDetectorOptions {
  dataRoot?: string;
  listDirectory?: DirectoryLister;
}

const listWithTypes: DirectoryLister = (dir) => readdir(dir, { withFileTypes: true });

const settle = async <T>(check: () => Promise<T>): Promise<SubCheck<T>> => {
  try {
    return { status: 'found', value: await check() };
  } catch (error) {
    if (isMissingPathError(error)) {
      return { status: 'absent' };
    }
    return { status: 'failed', error: getErrorMessage(error) };
  }
};

const valueOr = <T>(check: SubCheck<T>, fallback: T, label: string): T => {
  if (check.status === 'found') {
    return check.value;
  }
  if (check.status === 'failed') {
    logger.warn(`${label} check failed`, check.error);
  }
  return fallback;
};

const checkDirectory = (dir: string): Promise<SubCheck<boolean>> =>
  settle(async () => (await stat(dir)).isDirectory());

/**
 * Counts regular files with the extension below `root`.
 * Only a failure to list `root` itself rejects; unreadable subdirectories are skipped.
 */
async function countFilesWithExtension(root: string, extension: string, list: DirectoryLister): Promise<number> {
  const countIn = async (dir: string, entries: Dirent[]): Promise<number> => {
    let count = 0;
    for (const entry of entries) {
      const entryPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        let children: Dirent[];
        try {
          children = await list(entryPath);
        } catch (error) {
          logger.warn(`Skipping unreadable directory ${entryPath}`, getErrorMessage(error));
          continue;
        }
        count += await countIn(entryPath, children);
      } else if (entry.isFile() && entry.name.endsWith(extension)) {
        count += 1;
      }
    }
    return count;
  };

  return countIn(root, await list(root));
}

async function countCatalogEntries(catalogFile: string): Promise<number> {
  const raw = await readFile(catalogFile, 'utf8');
  const parsed: unknown = JSON.parse(raw);
  return safeParse(CatalogSchema, parsed, [], catalogFile).length;
}

const emptyDetection = (): DetectionResult => ({
  volume_available: false,
  taf_file_count: 0,
  catalog_entry_count: 0,
  image_directory_paths: [],
});

export class EnvironmentDetector {
  private readonly dataRoot: string;
  private readonly listDirectory: DirectoryLister;

  constructor(options: EnvironmentDetectorOptions = {}) {
    this.dataRoot = options.dataRoot ?? getDataRoot();
    this.listDirectory = options.listDirectory ?? listWithTypes;
  }

  /**
   * Never rejects. A missing or partial volume is reported as unavailable.
   */
  async detect(): Promise<DetectionResult> {
    const root = this.dataRoot;
    const rootIsDirectory = valueOr(await checkDirectory(root), false, 'data root');
    if (!rootIsDirectory) {
      logger.debug(`No data volume at ${root}`);
      return emptyDetection();
    }

    const configDir = path.join(root, DATA_LAYOUT.CONFIG_DIR);
    const libraryDir = path.join(root, DATA_LAYOUT.LIBRARY_DIR);
    const [configCheck, libraryCheck] = await Promise.all([
      checkDirectory(configDir),
      checkDirectory(libraryDir),
    ]);
    const available =
      valueOr(configCheck, false, 'config directory') && valueOr(libraryCheck, false, 'library directory');
    if (!available) {
      logger.info(`Data volume at ${root} lacks ${DATA_LAYOUT.CONFIG_DIR}/ or ${DATA_LAYOUT.LIBRARY_DIR}/`);
      return emptyDetection();
    }

    const imageDirs = DATA_LAYOUT.IMAGE_DIRS.map((relative) => path.join(root, relative));
    const [[tafCheck, catalogCheck], imageChecks] = await Promise.all([
      Promise.all([
        settle(() => countFilesWithExtension(libraryDir, DATA_LAYOUT.TAF_EXTENSION, this.listDirectory)),
        settle(() => countCatalogEntries(path.join(configDir, DATA_LAYOUT.CATALOG_FILE))),
      ]),
      Promise.all(imageDirs.map((dir) => checkDirectory(dir))),
    ]);

    const result: DetectionResult = {
      volume_available: true,
      volume_path: root,
      taf_file_count: valueOr(tafCheck, 0, 'archive count'),
      catalog_entry_count: valueOr(catalogCheck, 0, 'catalog'),
      image_directory_paths: imageDirs.filter((dir, index) =>
        valueOr(imageChecks[index], false, `image directory ${dir}`)
      ),
    };
    logger.info(`Detected data volume at ${root}`, {
      taf_file_count: result.taf_file_count,
      catalog_entry_count: result.catalog_entry_count,
    });
    return result;
  }
}
