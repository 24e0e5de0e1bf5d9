import * as fs from 'fs';
import * as path from 'path';
import { Logger, logger as rootLogger } from './logger.service';

export const REPORT_DIRECTORIES = ['test-results', 'playwright-report'] as const;

/** Full paths of every file under dir, sorted. */
export function listFiles(dir: string): string[] {
  if (!fs.existsSync(dir)) return [];
  const files: string[] = [];
  const walk = (current: string) => {
    for (const entry of fs.readdirSync(current, { withFileTypes: true })) {
      const full = path.join(current, entry.name);
      if (entry.isDirectory()) {
        walk(full);
      } else if (entry.isFile()) {
        files.push(full);
      }
    }
  };
  walk(dir);
  return files.sort();
}

/** Recursive copy preserving relative paths; returns the number of files copied. */
export function copyDirectory(source: string, destination: string): number {
  const files = listFiles(source);
  for (const file of files) {
    const target = path.join(destination, path.relative(source, file));
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.copyFileSync(file, target);
  }
  return files.length;
}

export interface CollectedArtifacts {
  copied: string[];
  missing: string[];
}

/** Mirrors the framework's report folders into the caller's output path. */
export function collectArtifacts(
  frameworkDir: string,
  outputPath: string,
  log: Logger = rootLogger.artifacts
): CollectedArtifacts {
  const result: CollectedArtifacts = { copied: [], missing: [] };
  fs.mkdirSync(outputPath, { recursive: true });

  for (const name of REPORT_DIRECTORIES) {
    const source = path.join(frameworkDir, name);
    if (!fs.existsSync(source)) {
      log.warn(`${name} not found in ${frameworkDir}; nothing to copy`);
      result.missing.push(name);
      continue;
    }
    const destination = path.join(outputPath, name);
    fs.mkdirSync(destination, { recursive: true });
    const count = copyDirectory(source, destination);
    log.info(`Copied ${count} file(s) from ${name} to ${destination}`);
    result.copied.push(name);
  }

  return result;
}
