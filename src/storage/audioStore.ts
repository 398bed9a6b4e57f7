import { randomUUID } from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';
import { NotFound } from '../errors';
import { log } from '../log';
import type { AudioArtifact, AudioSink, AudioStoreOptions, StoredAudio } from './types';

const EXTENSION = '.wav';
const TEMP_SUFFIX = '.part';
const ID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Synthesized speech cache on local disk, one file per artifact.
 *
 * Files are written under a temporary name and renamed into place, so a
 * reader only ever sees complete artifacts. Ids are random UUIDs and files
 * are never rewritten, so concurrent calls need no locking.
 */
export class AudioStore implements AudioSink {
  private readonly dir: string;
  private readonly publicBaseUrl: string;
  private sweepTimer: NodeJS.Timeout | undefined;
  private sweepInProgress = false;

  constructor(private readonly options: AudioStoreOptions) {
    this.dir = path.resolve(options.dir);
    this.publicBaseUrl = options.publicBaseUrl.replace(/\/+$/, '');
  }

  public urlFor(id: string): string {
    return `${this.publicBaseUrl}/audio/${id}${EXTENSION}`;
  }

  public async put(data: Buffer): Promise<AudioArtifact> {
    const id = randomUUID();
    const fileName = `${id}${EXTENSION}`;
    const localPath = path.join(this.dir, fileName);
    const tempPath = `${localPath}${TEMP_SUFFIX}`;

    await fs.mkdir(this.dir, { recursive: true });
    await fs.writeFile(tempPath, data);
    await fs.rename(tempPath, localPath);

    return {
      id,
      fileName,
      localPath,
      publicUrl: this.urlFor(id),
      sizeBytes: data.length,
      createdAt: new Date(),
    };
  }

  /**
   * Byte-exact read of a stored artifact. Accepts the bare id or the
   * `<id>.wav` file name used in public URLs.
   */
  public async get(idOrFileName: string): Promise<StoredAudio> {
    const id = idOrFileName.endsWith(EXTENSION)
      ? idOrFileName.slice(0, -EXTENSION.length)
      : idOrFileName;

    if (!ID_PATTERN.test(id)) {
      throw new NotFound('audio', idOrFileName);
    }

    const localPath = path.join(this.dir, `${id}${EXTENSION}`);
    try {
      const [data, stats] = await Promise.all([fs.readFile(localPath), fs.stat(localPath)]);
      return { id, data, createdAt: stats.mtime };
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        throw new NotFound('audio', idOrFileName);
      }
      throw error;
    }
  }

  /**
   * Delete artifacts older than maxAgeMs. Returns the number removed.
   * A sweep requested while another is running is skipped.
   */
  public async sweep(now: number = Date.now()): Promise<number> {
    if (this.sweepInProgress) {
      return 0;
    }

    this.sweepInProgress = true;
    let deleted = 0;
    try {
      const entries = await fs.readdir(this.dir, { withFileTypes: true });

      for (const entry of entries) {
        if (!entry.isFile()) {
          continue;
        }

        const filePath = path.join(this.dir, entry.name);
        try {
          const stats = await fs.stat(filePath);
          if (now - stats.mtimeMs > this.options.maxAgeMs) {
            await fs.unlink(filePath);
            deleted += 1;
          }
        } catch (error) {
          log.warn({ err: error, filePath }, 'audio sweep file error');
        }
      }

      if (deleted > 0) {
        log.info({ event: 'audio_sweep', deleted }, 'audio sweep completed');
      }
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
        log.error({ err: error }, 'audio sweep failed');
      }
    } finally {
      this.sweepInProgress = false;
    }

    return deleted;
  }

  public startSweeper(): void {
    if (this.sweepTimer) {
      return;
    }

    this.sweepTimer = setInterval(() => {
      void this.sweep();
    }, this.options.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  public stopSweeper(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
  }
}
