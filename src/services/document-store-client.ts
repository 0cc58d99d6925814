/**
 * Document store client
 * Uploads booking documents and asks the store to check them
 */

import { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { ProviderEndpointConfig } from '../config/env.js';
import type { DocumentParty } from '../types/booking.js';
import { ExternalServiceError } from '../utils/errors.js';
import type { DocumentVerdict } from './document-gate.js';
import { callProvider, createProviderAxios, requestHeaders, type CallContext } from './provider-http.js';

const UploadResponseSchema = z.object({
  record_id: z.string().min(1),
});

const VerifyResponseSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('verified') }),
  z.object({ status: z.literal('rejected'), reason: z.string().default('document rejected') }),
]);

export interface DocumentPayload {
  party: DocumentParty;
  requestId: string;
  fileName: string;
  mimeType: string;
  /** Base64-encoded file content */
  content: string;
}

export class DocumentStoreClient {
  private axiosClient: AxiosInstance;

  constructor(private readonly config: ProviderEndpointConfig) {
    this.axiosClient = createProviderAxios(config);
  }

  async upload(type: string, payload: DocumentPayload, context: CallContext = {}): Promise<string> {
    return callProvider(
      'document-store',
      this.config,
      async () => {
        const response = await this.axiosClient.post(
          '/documents',
          {
            type,
            party: payload.party,
            request_id: payload.requestId,
            file_name: payload.fileName,
            mime_type: payload.mimeType,
            content: payload.content,
          },
          { headers: requestHeaders(context.correlationId) }
        );
        const parsed = UploadResponseSchema.safeParse(response.data);
        if (!parsed.success) {
          throw new ExternalServiceError('document-store', 'malformed upload response');
        }
        return parsed.data.record_id;
      },
      context
    );
  }

  async verify(recordId: string, context: CallContext = {}): Promise<DocumentVerdict> {
    return callProvider(
      'document-store',
      this.config,
      async () => {
        const response = await this.axiosClient.post(
          `/documents/${encodeURIComponent(recordId)}/verify`,
          {},
          { headers: requestHeaders(context.correlationId) }
        );
        const parsed = VerifyResponseSchema.safeParse(response.data);
        if (!parsed.success) {
          throw new ExternalServiceError('document-store', 'malformed verification response');
        }
        return parsed.data;
      },
      context
    );
  }
}
