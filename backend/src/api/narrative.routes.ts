/**
 * NARRATIVE ROUTES
 *
 * - POST /api/narrative - { image: base64 | data URL, mimeType } → recommendation
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { decodeChartImage, type NarrativeClient } from '../modules/narrative/index.js';
import { NarrativeBodySchema } from './analysis.contracts.js';

export async function narrativeRoutes(app: FastifyInstance, deps: { narrative: NarrativeClient }): Promise<void> {
  app.post('/api/narrative', async (req: FastifyRequest, reply: FastifyReply) => {
    const body = NarrativeBodySchema.parse(req.body);
    const image = decodeChartImage(body.image, body.mimeType);
    const result = await deps.narrative.recommend(image);

    return reply.send({ ok: true, data: result });
  });
}
