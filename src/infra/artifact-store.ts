import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { DEFAULT_ARTIFACTS_DIR, SCREENSHOTS_SUBDIR } from '../constants/index.js';
import { ILogger } from './logger.js';

export interface IArtifactStore {
  /**
   * Persist a screenshot and return its reference, relative to the artifacts directory
   */
  saveScreenshot(name: string, image: Buffer): Promise<string>;
}

export function toArtifactName(name: string): string {
  const cleaned = name
    .toLowerCase()
    .replace(/[^a-z0-9._-]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return cleaned || 'screenshot';
}

/**
 * Writes run artifacts under `<rootDir>/screenshots`
 */
export class ArtifactStore implements IArtifactStore {
  private initialized = false;
  private counter = 0;

  constructor(
    private rootDir: string = DEFAULT_ARTIFACTS_DIR,
    private logger?: ILogger
  ) {}

  private async ensureDir(): Promise<void> {
    if (this.initialized) return;
    await mkdir(path.join(this.rootDir, SCREENSHOTS_SUBDIR), { recursive: true });
    this.initialized = true;
  }

  async saveScreenshot(name: string, image: Buffer): Promise<string> {
    await this.ensureDir();
    this.counter++;
    const fileName = `${String(this.counter).padStart(4, '0')}-${toArtifactName(name)}.png`;
    const reference = path.posix.join(SCREENSHOTS_SUBDIR, fileName);

    await writeFile(path.join(this.rootDir, SCREENSHOTS_SUBDIR, fileName), image);
    this.logger?.debug('Screenshot saved', { reference, bytes: image.length });

    return reference;
  }

  getRootDir(): string {
    return this.rootDir;
  }
}
