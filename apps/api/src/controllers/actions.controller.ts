import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { FILE_STATUSES } from '@wildlife-telemetry/domain';
import type { IntegrationActionsPort } from '@wildlife-telemetry/domain';

const fileStatusSchema = z.enum(FILE_STATUSES);

const fileBodySchema = z.object({
  filename: z.string().min(1).max(512),
});

const setStatusBodySchema = fileBodySchema.extend({
  status: fileStatusSchema,
});

const processBodySchema = z.object({
  filename: z.string().min(1).max(512).optional(),
});

const integrationParamsSchema = z.object({
  integrationId: z.string().min(1).max(128),
});

/** Routes mounted under /api/integrations; one POST per integration action. */
export function createActionsRouter(actions: IntegrationActionsPort): Router {
  const router = Router();

  /** POST /:integrationId/actions/pull_observations: fetch and stage vendor payloads */
  router.post('/:integrationId/actions/pull_observations', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { integrationId } = integrationParamsSchema.parse(req.params);
      res.json(await actions.pullObservations(integrationId));
    } catch (err) {
      next(err);
    }
  });

  /** POST /:integrationId/actions/process_observations: one file, or every pending file */
  router.post('/:integrationId/actions/process_observations', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { integrationId } = integrationParamsSchema.parse(req.params);
      const body = processBodySchema.parse(req.body ?? {});
      res.json(await actions.processObservations(integrationId, body));
    } catch (err) {
      next(err);
    }
  });

  router.post('/:integrationId/actions/get_file_status', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { integrationId } = integrationParamsSchema.parse(req.params);
      const body = fileBodySchema.parse(req.body);
      res.json(await actions.getFileStatus(integrationId, body));
    } catch (err) {
      next(err);
    }
  });

  router.post('/:integrationId/actions/set_file_status', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { integrationId } = integrationParamsSchema.parse(req.params);
      const body = setStatusBodySchema.parse(req.body);
      res.json(await actions.setFileStatus(integrationId, body));
    } catch (err) {
      next(err);
    }
  });

  router.post('/:integrationId/actions/reprocess_file', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { integrationId } = integrationParamsSchema.parse(req.params);
      const body = fileBodySchema.parse(req.body);
      res.json(await actions.reprocessFile(integrationId, body));
    } catch (err) {
      next(err);
    }
  });

  router.post('/:integrationId/actions/:actionId', (req: Request, res: Response) => {
    res.status(404).json({ error: `Unknown action '${req.params['actionId']}'` });
  });

  return router;
}
