/**
 * 临时结果存储（磁盘 + 内存索引 + TTL）
 * 生成结果只保存 ttlMs，过期后无论是被定时清理还是被访问时发现，都会删除文件
 */

import { randomBytes } from 'node:crypto';
import { mkdir, readdir, rm, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { StorageError, errorMessage } from '../utils/errors.js';

export const ARTIFACT_NAME_PATTERN = /^[a-f0-9]{16}\.jpg$/;

export interface Artifact {
  name: string;
  path: string;
  createdAt: number;
}

export interface ArtifactStoreOptions {
  dir: string;
  ttlMs: number;
  now?: () => number;
}

export class ArtifactStore {
  readonly dir: string;
  readonly ttlMs: number;
  private readonly now: () => number;
  private readonly entries = new Map<string, Artifact>();
  private timer: NodeJS.Timeout | null = null;

  constructor(options: ArtifactStoreOptions) {
    this.dir = path.resolve(options.dir);
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * 创建目录，并把重启前遗留的文件按 mtime 重新纳入索引，随后立即清理一次
   */
  async init(): Promise<void> {
    await mkdir(this.dir, { recursive: true });

    const names = await readdir(this.dir);
    for (const name of names) {
      if (!ARTIFACT_NAME_PATTERN.test(name) || this.entries.has(name)) continue;
      const filePath = path.join(this.dir, name);
      try {
        const info = await stat(filePath);
        this.entries.set(name, { name, path: filePath, createdAt: info.mtimeMs });
      } catch (error) {
        console.warn(`[ArtifactStore] Skipping ${name}:`, errorMessage(error));
      }
    }

    const removed = await this.sweep();
    console.log(`[ArtifactStore] Ready at ${this.dir} (${this.entries.size} live, ${removed.length} expired removed)`);
  }

  async save(buffer: Buffer): Promise<Artifact> {
    const name = `${randomBytes(8).toString('hex')}.jpg`;
    const filePath = path.join(this.dir, name);

    try {
      await writeFile(filePath, buffer, { flag: 'wx' });
    } catch (error) {
      console.error(`[ArtifactStore] Failed to write ${name}:`, errorMessage(error));
      throw new StorageError('Failed to store result', error);
    }

    const artifact: Artifact = { name, path: filePath, createdAt: this.now() };
    this.entries.set(name, artifact);
    return artifact;
  }

  expiresAt(artifact: Artifact): number {
    return artifact.createdAt + this.ttlMs;
  }

  /**
   * 返回仍在有效期内的结果；已过期的条目在这里顺带删除
   */
  async resolve(name: string): Promise<Artifact | null> {
    const artifact = this.entries.get(name);
    if (!artifact) return null;

    if (this.isExpired(artifact, this.now())) {
      await this.remove(artifact);
      return null;
    }
    return artifact;
  }

  /**
   * 删除所有过期结果，返回被删除的文件名
   * 文件已经不存在不算错误
   */
  async sweep(): Promise<string[]> {
    const now = this.now();
    const expired = [...this.entries.values()].filter(a => this.isExpired(a, now));

    for (const artifact of expired) {
      await this.remove(artifact);
    }
    return expired.map(a => a.name);
  }

  start(intervalMs: number): void {
    this.stop();
    this.timer = setInterval(() => {
      this.sweep()
        .then(removed => {
          if (removed.length > 0) {
            console.log(`[ArtifactStore] Swept ${removed.length} expired artifacts`);
          }
        })
        .catch(error => {
          console.error('[ArtifactStore] Sweep failed:', error);
        });
    }, intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  private isExpired(artifact: Artifact, now: number): boolean {
    return now - artifact.createdAt >= this.ttlMs;
  }

  private async remove(artifact: Artifact): Promise<void> {
    this.entries.delete(artifact.name);
    try {
      await rm(artifact.path, { force: true });
    } catch (error) {
      console.warn(`[ArtifactStore] Failed to delete ${artifact.name}:`, errorMessage(error));
    }
  }
}
