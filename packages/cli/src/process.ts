import { readFile, writeFile } from 'node:fs/promises';
import {
  convertDocument,
  type HeaderStatus,
  type LatexValidator,
  type RegionKind,
} from '@docmath/core';
import { FileProcessingError } from './errors';
import { findHtmlFiles } from './files';
import type { Logger } from './logger';

export interface ProcessOptions {
  logger: Logger;
  scriptTag?: string;
  dryRun?: boolean;
  validator?: LatexValidator;   // Validate every converted region when set
}

export interface RegionIssue {
  filePath: string;
  kind: RegionKind;
  latex: string;
  errors: string[];
}

export interface FileReport {
  filePath: string;
  regions: number;
  header: HeaderStatus;
  changed: boolean;
  written: boolean;
  issues: RegionIssue[];
}

export interface RunReport {
  files: FileReport[];
  converted: number;
  unchanged: number;
  regions: number;
  issues: RegionIssue[];
}

/**
 * Convert one file in place. The file is only rewritten when its content changed;
 * read and write failures surface as FileProcessingError.
 */
export async function processFile(filePath: string, options: ProcessOptions): Promise<FileReport> {
  const { logger, validator } = options;

  let html: string;
  try {
    html = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new FileProcessingError(filePath, error);
  }

  const result = convertDocument(html, { scriptTag: options.scriptTag });
  if (result.header === 'missing') {
    logger.warn(`no <head> in ${filePath}, skipping script injection`);
  }

  const issues: RegionIssue[] = [];
  if (validator) {
    for (const region of result.regions) {
      const validation = validator.validate(region.latex, region.displayMode);
      if (!validation.valid) {
        issues.push({ filePath, kind: region.kind, latex: region.latex, errors: validation.errors });
        logger.warn(`invalid LaTeX in ${filePath} (${region.kind}): ${validation.errors.join('; ')}`);
      }
    }
  }

  const written = result.changed && !options.dryRun;
  if (written) {
    try {
      await writeFile(filePath, result.html, 'utf-8');
    } catch (error) {
      throw new FileProcessingError(filePath, error);
    }
  }

  if (result.changed) {
    const verb = options.dryRun ? 'would convert' : 'converted';
    logger.info(`${verb} ${filePath} (${result.regions.length} regions)`);
  } else {
    logger.info(`unchanged ${filePath}`);
  }

  return {
    filePath,
    regions: result.regions.length,
    header: result.header,
    changed: result.changed,
    written,
    issues,
  };
}

/** Convert every .html file under `root`, one at a time; the first failure aborts the run */
export async function processTree(root: string, options: ProcessOptions): Promise<RunReport> {
  let filePaths: string[];
  try {
    filePaths = await findHtmlFiles(root);
  } catch (error) {
    throw new FileProcessingError(root, error);
  }

  const files: FileReport[] = [];
  for (const filePath of filePaths) {
    files.push(await processFile(filePath, options));
  }

  return {
    files,
    converted: files.filter((file) => file.changed).length,
    unchanged: files.filter((file) => !file.changed).length,
    regions: files.reduce((total, file) => total + file.regions, 0),
    issues: files.flatMap((file) => file.issues),
  };
}
