import { FastifyInstance } from 'fastify';
import { ZodTypeProvider } from 'fastify-type-provider-zod';
import z from 'zod';
import { legacyOrderController } from '../controllers/legacyOrderController';
import { LegacyOrderParams, LegacyOrderResponse, LegacyTransformResponse } from '../dtos/legacyOrderDtos';

export default async function legacyOrderRoutes(fastify: FastifyInstance) {
  const app = fastify.withTypeProvider<ZodTypeProvider>();

  app.get(
    '/orders/:caseId',
    {
      schema: {
        params: LegacyOrderParams,
        response: {
          200: LegacyOrderResponse,
        },
      },
    },
    legacyOrderController.getOrder
  );

  app.post(
    '/transform',
    {
      schema: {
        body: z.unknown(),
        response: {
          200: LegacyTransformResponse,
        },
      },
    },
    legacyOrderController.transform
  );
}
