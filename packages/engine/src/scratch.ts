import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { EngineLogger } from './logger';

/**
 * Private working directory of one plan execution. Every file handed out by
 * `file()` is tracked and removed by `dispose()`, followed by the directory.
 */
export class ScratchSpace {
  readonly dir: string;
  private readonly tracked = new Set<string>();

  private constructor(dir: string, private readonly logger: EngineLogger) {
    this.dir = dir;
  }

  static async create(root: string, stem: string, logger: EngineLogger): Promise<ScratchSpace> {
    const safeStem = stem.replace(/[^a-zA-Z0-9_-]/g, '_') || 'edit';
    const dir = path.join(root, `${safeStem}-${uuidv4()}`);
    await fs.promises.mkdir(dir, { recursive: true });
    return new ScratchSpace(dir, logger);
  }

  file(name: string): string {
    const p = path.join(this.dir, name);
    this.tracked.add(p);
    return p;
  }

  /** Never throws; failures are logged so they cannot mask the primary error. */
  async dispose(): Promise<void> {
    for (const p of this.tracked) {
      try {
        await fs.promises.rm(p, { force: true });
      } catch (e) {
        this.logger.warn({ file: p, err: String(e) }, 'Failed to remove scratch file');
      }
    }
    this.tracked.clear();

    try {
      await fs.promises.rm(this.dir, { recursive: true, force: true });
    } catch (e) {
      this.logger.warn({ dir: this.dir, err: String(e) }, 'Failed to remove scratch directory');
    }
  }
}
