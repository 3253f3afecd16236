import { watch, type FSWatcher } from 'node:fs';
import { mkdir, readdir, readFile, rename, stat } from 'node:fs/promises';
import path from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { mediaKindFor } from '../ingestion';
import { isMissing } from '../lib/files';
import type { Logger } from '../lib/logger';
import type { PermitPipeline } from '../pipeline';
import type { PipelineOutcome } from '../types/permit';

export const ARCHIVE_DIR = 'processed';

export interface FolderMonitorOptions {
  /** Wait before reading a new file so the writer can finish. */
  settleMs?: number;
}

/**
 * Watches an intake folder and submits every new supported file to the
 * pipeline, exactly like an upload. Files that become drafts are moved to
 * `<folder>/processed/`; others stay where they are for a clerk to look at.
 */
export class FolderMonitor {
  private watcher: FSWatcher | null = null;
  /** Resolves when the files present at start have been handled; never rejects. */
  initialScan: Promise<void> = Promise.resolve();
  private readonly inProgress = new Set<string>();
  private readonly settleMs: number;
  private readonly log: Logger;

  constructor(
    private readonly folder: string,
    private readonly pipeline: Pick<PermitPipeline, 'processFile'>,
    logger: Logger,
    options: FolderMonitorOptions = {}
  ) {
    this.settleMs = options.settleMs ?? 2000;
    this.log = logger.child({ component: 'folder-monitor', folder });
  }

  get isRunning(): boolean {
    return this.watcher !== null;
  }

  /**
   * Starts watching. Files already waiting in the folder are submitted in the
   * background; `initialScan` settles once they have all been handled.
   */
  async start(): Promise<void> {
    if (this.watcher) {
      this.log.warn('Folder monitoring already running');
      return;
    }
    await mkdir(this.folder, { recursive: true });

    this.watcher = watch(this.folder, { persistent: false }, (_event, fileName) => {
      if (fileName) {
        void this.handleFile(path.join(this.folder, fileName.toString()), this.settleMs);
      }
    });
    this.watcher.on('error', (err) => {
      this.log.error({ err }, 'Folder watcher failed');
    });
    this.log.info('Started monitoring folder');

    this.initialScan = this.scanExisting().then(
      (outcomes) => {
        this.log.info({ files: outcomes.length }, 'Initial folder scan finished');
      },
      (err: unknown) => {
        this.log.error({ err }, 'Initial folder scan failed');
      }
    );
  }

  stop(): void {
    if (!this.watcher) {
      return;
    }
    this.watcher.close();
    this.watcher = null;
    this.log.info('Stopped folder monitoring');
  }

  /**
   * Submits every supported file currently in the folder.
   */
  async scanExisting(): Promise<Array<PipelineOutcome | null>> {
    const entries = await readdir(this.folder, { withFileTypes: true });
    const files = entries.filter((entry) => entry.isFile()).map((entry) => path.join(this.folder, entry.name));
    const outcomes: Array<PipelineOutcome | null> = [];
    for (const filePath of files) {
      outcomes.push(await this.handleFile(filePath, 0));
    }
    return outcomes;
  }

  /**
   * Processes a single file from the folder. Resolves null when the file is
   * skipped or processing fails; failures are logged, not rethrown, since
   * nobody waits on a watch event.
   */
  async handleFile(filePath: string, settleMs = this.settleMs): Promise<PipelineOutcome | null> {
    const fileName = path.basename(filePath);
    if (!mediaKindFor(fileName) || this.inProgress.has(filePath)) {
      return null;
    }

    this.inProgress.add(filePath);
    try {
      if (settleMs > 0) {
        await sleep(settleMs);
      }
      const stats = await stat(filePath).catch((error: unknown) => {
        if (isMissing(error)) {
          return null;
        }
        throw error;
      });
      // Rename events also fire when a file leaves the folder
      if (!stats?.isFile()) {
        return null;
      }

      this.log.info({ fileName }, 'New file detected');
      const outcome = await this.pipeline.processFile(fileName, await readFile(filePath), 'folder');
      if (outcome.status === 'draft_created') {
        await this.archive(filePath);
      } else {
        this.log.warn(
          { fileName, requestId: outcome.requestId, status: outcome.status, message: outcome.validation.message },
          'File not turned into a draft'
        );
      }
      return outcome;
    } catch (err) {
      this.log.error({ err, fileName }, 'Error processing file');
      return null;
    } finally {
      this.inProgress.delete(filePath);
    }
  }

  private async archive(filePath: string): Promise<void> {
    const archiveDir = path.join(this.folder, ARCHIVE_DIR);
    await mkdir(archiveDir, { recursive: true });
    const target = path.join(archiveDir, path.basename(filePath));
    await rename(filePath, target);
    this.log.info({ target }, 'Archived processed file');
  }
}
