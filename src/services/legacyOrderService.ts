import type { AuditTrailJSON } from './compat/auditTrail';
import { classifyResponse, normalizeErrorResponse, toLegacy } from './compat';
import { DEFAULT_COMPAT_SETTINGS } from './compat/settings';
import type {
  CompatSettings,
  LegacyDocument,
  LegacyOrder,
  NormalizedError,
  ResponseClass,
  SourceVersion,
} from './compat/types';
import type { OrderSource } from './orderSourceService';

export type LegacyOrderOutcome =
  | {
      kind: 'order';
      version: SourceVersion;
      order: LegacyOrder | LegacyDocument;
      audit: AuditTrailJSON;
      classification: ResponseClass;
    }
  | {
      kind: 'error';
      statusCode: number;
      error: NormalizedError;
      classification: ResponseClass;
    };

export type LegacyTransformOutput = {
  version: SourceVersion;
  order: LegacyOrder | LegacyDocument;
  audit: AuditTrailJSON;
};

function isSuccess(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}

/**
 * Serves v1 documents to old clients: fetches the upstream response and
 * either transforms the body or flattens the error into v1 shape.
 *
 * Only the status code picks the branch. A 2xx body that announces its own
 * deprecation is still transformed and carries `DEPRECATED` along.
 */
export class LegacyOrderService {
  constructor(
    private readonly source: OrderSource,
    private readonly settings: CompatSettings = DEFAULT_COMPAT_SETTINGS
  ) {}

  transform(doc: unknown): LegacyTransformOutput {
    const { version, order, audit } = toLegacy(doc, this.settings);
    return { version, order, audit: audit.toJSON() };
  }

  async getLegacyOrder(caseId: string): Promise<LegacyOrderOutcome> {
    const { statusCode, body } = await this.source.fetch(caseId);
    const classification = classifyResponse(statusCode, body);

    if (!isSuccess(statusCode)) {
      return { kind: 'error', statusCode, error: normalizeErrorResponse(statusCode, body), classification };
    }

    const { version, order, audit } = this.transform(body);
    return { kind: 'order', version, order, audit, classification };
  }
}
