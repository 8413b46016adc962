import fs from 'fs/promises';
import path from 'path';
import { workspaceLogger } from '../../utils/logger';

export type WorkspacePurpose = 'upload' | 'export';

export interface WorkspaceHandle {
  readonly dir: string;
  readonly purpose: WorkspacePurpose;
}

/**
 * Per-request temporary directories under a single root.
 */
export class WorkspaceManager {
  private readonly released = new WeakSet<WorkspaceHandle>();

  constructor(private readonly rootDir: string) {}

  get root(): string {
    return this.rootDir;
  }

  async acquire(purpose: WorkspacePurpose): Promise<WorkspaceHandle> {
    await fs.mkdir(this.rootDir, { recursive: true });
    const dir = await fs.mkdtemp(path.join(this.rootDir, `${purpose}-`));

    workspaceLogger.debug({ dir, purpose }, 'Workspace acquired');
    return { dir, purpose };
  }

  /**
   * Remove the workspace. Never throws; repeated calls are no-ops.
   */
  async release(handle: WorkspaceHandle): Promise<void> {
    if (this.released.has(handle)) {
      return;
    }
    this.released.add(handle);

    try {
      await fs.rm(handle.dir, { recursive: true, force: true });
      workspaceLogger.debug({ dir: handle.dir }, 'Workspace released');
    } catch (error) {
      workspaceLogger.error({ err: error, dir: handle.dir }, 'Failed to remove workspace');
    }
  }

  /**
   * Run `task` inside a fresh workspace that is removed on every exit path.
   */
  async withWorkspace<T>(purpose: WorkspacePurpose, task: (handle: WorkspaceHandle) => Promise<T>): Promise<T> {
    const handle = await this.acquire(purpose);
    try {
      return await task(handle);
    } finally {
      await this.release(handle);
    }
  }
}
