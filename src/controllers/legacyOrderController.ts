import { FastifyRequest, FastifyReply } from 'fastify';
import { LegacyOrderParamsType } from '../dtos/legacyOrderDtos';

export const legacyOrderController = {
  async getOrder(request: FastifyRequest<{ Params: LegacyOrderParamsType }>, reply: FastifyReply) {
    const { caseId } = request.params;
    const outcome = await request.server.legacyOrders.getLegacyOrder(caseId);

    if (outcome.kind === 'error') {
      request.log.warn(
        { caseId, statusCode: outcome.statusCode, classification: outcome.classification, error: outcome.error.error },
        'Upstream order request failed'
      );
      return reply.code(outcome.statusCode).send({ ...outcome.error, classification: outcome.classification });
    }

    request.log.info(
      { caseId, version: outcome.version, warnings: outcome.audit.warnings.length, classification: outcome.classification },
      'Served legacy order'
    );
    return reply.send({ order: outcome.order, audit: outcome.audit, classification: outcome.classification });
  },

  async transform(request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) {
    const result = request.server.legacyOrders.transform(request.body);

    if (result.audit.warnings.length > 0) {
      request.log.info({ orderId: result.order.orderId, warnings: result.audit.warnings }, 'Transformed with warnings');
    }
    return reply.send({ order: result.order, audit: result.audit });
  },
};
