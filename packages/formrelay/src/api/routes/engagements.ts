import { Hono } from 'hono';
import type { Engager } from '../../campaign/CampaignRunner.js';
import { validateBody, type ValidatedBodyEnv } from '../middleware/validation.js';
import { CreateEngagementSchema, type CreateEngagementInput } from '../schemas/index.js';

export function createEngagementRoutes(engine: Engager) {
  const engagements = new Hono<ValidatedBodyEnv<CreateEngagementInput>>();

  // ─── POST /engagements - Run one engagement attempt ───────────

  engagements.post('/', validateBody(CreateEngagementSchema), async (c) => {
    const body = c.get('validatedBody');
    const outcome = await engine.engage(body.url, body.message, { signal: c.req.raw.signal });
    return c.json(outcome, 200);
  });

  return engagements;
}
