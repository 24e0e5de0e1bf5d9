/**
 * Failure Analysis Service
 *
 * After a failed run, lists what Playwright left behind (result JSON, traces,
 * screenshots, videos, logs) so the pipeline log points straight at it.
 * Diagnostic only: nothing in here may fail the task.
 */

import * as fs from 'fs';
import * as path from 'path';
import { TEST_ENVIRONMENT_KEYS, config } from '../config';
import { toError } from '../errors';
import type { ArtifactCategory, ArtifactExcerpt, FailureReport } from '../models/run.model';
import { REPORT_DIRECTORIES, listFiles } from './artifact.service';
import { Logger, logger as rootLogger } from './logger.service';

const ROOT_RESULT_FILES = ['results.json', 'test-results.json'];

const CATEGORY_EXTENSIONS: Record<ArtifactCategory, string[]> = {
  resultFiles: ['.json'],
  traces: ['.zip'],
  screenshots: ['.png', '.jpg', '.jpeg'],
  videos: ['.webm', '.mp4'],
  logs: ['.log', '.txt'],
};

const CATEGORIES: ArtifactCategory[] = ['resultFiles', 'traces', 'screenshots', 'videos', 'logs'];

const EXCERPT_CATEGORIES: ArtifactCategory[] = ['resultFiles', 'logs'];

export function categorize(file: string): ArtifactCategory | undefined {
  const extension = path.extname(file).toLowerCase();
  return CATEGORIES.find((category) => CATEGORY_EXTENSIONS[category].includes(extension));
}

function emptyArtifacts(): Record<ArtifactCategory, string[]> {
  return { resultFiles: [], traces: [], screenshots: [], videos: [], logs: [] };
}

function readExcerpt(file: string, maxLength: number): ArtifactExcerpt {
  const content = fs.readFileSync(file, 'utf8');
  return {
    path: file,
    content: content.slice(0, maxLength),
    truncated: content.length > maxLength,
  };
}

export class FailureAnalysisService {
  private log: Logger;
  private maxEntries: number;
  private maxExcerptLength: number;

  constructor(options: { logger?: Logger; maxEntries?: number; maxExcerptLength?: number } = {}) {
    this.log = options.logger ?? rootLogger.testExecution;
    this.maxEntries = options.maxEntries ?? config.analysis.maxEntriesPerCategory;
    this.maxExcerptLength = options.maxExcerptLength ?? config.analysis.maxExcerptLength;
  }

  analyzeFailure(resultsDir: string, environment: Record<string, string | undefined> = {}): FailureReport {
    const report: FailureReport = {
      artifacts: emptyArtifacts(),
      excerpts: [],
      environmentHints: {},
    };

    for (const key of TEST_ENVIRONMENT_KEYS) {
      report.environmentHints[key] = environment[key] ? 'set' : 'missing';
    }

    try {
      const candidates = [
        ...ROOT_RESULT_FILES.map((name) => path.join(resultsDir, name)).filter((file) => fs.existsSync(file)),
        ...REPORT_DIRECTORIES.flatMap((name) => listFiles(path.join(resultsDir, name))),
      ];

      for (const file of candidates) {
        const category = categorize(file);
        if (!category) continue;
        const bucket = report.artifacts[category];
        if (bucket.length >= this.maxEntries) continue;
        bucket.push(file);

        if (EXCERPT_CATEGORIES.includes(category)) {
          try {
            report.excerpts.push(readExcerpt(file, this.maxExcerptLength));
          } catch (error) {
            this.log.debug(`Could not read ${file}`, { error: toError(error).message });
          }
        }
      }
    } catch (error) {
      this.log.warn('Failure analysis could not finish', { error: toError(error).message });
    }

    return report;
  }

  formatReport(report: FailureReport): string {
    const labels: Record<ArtifactCategory, string> = {
      resultFiles: 'Result files',
      traces: 'Traces',
      screenshots: 'Screenshots',
      videos: 'Videos',
      logs: 'Logs',
    };

    const lines = ['=== Test failure analysis ==='];
    for (const category of CATEGORIES) {
      const label = labels[category];
      const files = report.artifacts[category];
      lines.push(`${label}: ${files.length === 0 ? 'none found' : files.length}`);
      for (const file of files) {
        lines.push(`  - ${file}`);
      }
    }

    for (const excerpt of report.excerpts) {
      lines.push(`--- ${excerpt.path}${excerpt.truncated ? ' (truncated)' : ''} ---`);
      lines.push(excerpt.content);
    }

    lines.push('Environment:');
    for (const [key, state] of Object.entries(report.environmentHints)) {
      lines.push(`  ${key}: ${state}`);
    }
    return lines.join('\n');
  }
}
