import express from 'express';
import type { ArtifactStore } from '../services/artifactStore.js';
import { ARTIFACT_NAME_PATTERN } from '../services/artifactStore.js';

/**
 * GET /tmp/:name
 * 对外提供生成结果，过期或不存在一律 404
 */
export function createArtifactRouter(store: ArtifactStore): express.Router {
  const router = express.Router();

  router.get('/:name', async (req, res, next) => {
    try {
      const { name } = req.params;
      if (!ARTIFACT_NAME_PATTERN.test(name)) {
        return res.status(404).json({ error: 'Not found' });
      }

      const artifact = await store.resolve(name);
      if (!artifact) {
        return res.status(404).json({ error: 'Not found' });
      }

      const remainingSeconds = Math.max(0, Math.floor((store.expiresAt(artifact) - Date.now()) / 1000));
      res.sendFile(
        artifact.path,
        {
          headers: {
            'Content-Type': 'image/jpeg',
            'Cache-Control': `private, max-age=${remainingSeconds}`,
          },
        },
        err => {
          if (!err) return;
          // 文件可能刚被清理任务删除
          console.warn(`[Artifacts Route] Failed to send ${name}:`, err.message);
          if (!res.headersSent) {
            res.status(404).json({ error: 'Not found' });
          }
        }
      );
    } catch (error) {
      next(error);
    }
  });

  return router;
}
