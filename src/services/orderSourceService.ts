import z from 'zod';
import sourceResponses from '../fixtures/sourceResponses.json';

export type SourceResponse = {
  statusCode: number;
  body: unknown;
};

/** Supplies the raw upstream response for an order case. */
export interface OrderSource {
  fetch(caseId: string): Promise<SourceResponse>;
}

const SourceResponseSchema = z.object({
  statusCode: z.number().int().min(100).max(599),
  body: z.unknown(),
});

export const SourceCatalogueSchema = z.record(SourceResponseSchema);

export const NOT_FOUND_RESPONSE: SourceResponse = {
  statusCode: 404,
  body: { error: 'NOT_FOUND', message: 'Order not found' },
};

/** Serves canned upstream responses from an in-memory catalogue. */
export class FixtureOrderSource implements OrderSource {
  private readonly catalogue = new Map<string, SourceResponse>();

  constructor(catalogue: unknown) {
    const parsed = SourceCatalogueSchema.safeParse(catalogue);
    if (!parsed.success) {
      throw new Error(`[OrderSource] Invalid fixture catalogue: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
    }
    for (const [caseId, res] of Object.entries(parsed.data)) {
      this.catalogue.set(caseId, { statusCode: res.statusCode, body: res.body });
    }
  }

  get caseIds(): string[] {
    return [...this.catalogue.keys()];
  }

  async fetch(caseId: string): Promise<SourceResponse> {
    const response = this.catalogue.get(caseId) ?? NOT_FOUND_RESPONSE;
    return structuredClone(response);
  }
}

export function createDefaultOrderSource(): FixtureOrderSource {
  return new FixtureOrderSource(sourceResponses);
}
