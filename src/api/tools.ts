/**
 * Tool API routes
 * GET /tools lists the booking tools, POST /tools/:name runs one
 *
 * Every response uses the envelope { ok: true, result } | { ok: false, error }.
 */

import { Router, Request, Response } from 'express';
import { z } from 'zod';
import type { BookingOrchestrator, EventMeta } from '../orchestrator/booking-orchestrator.js';
import { toStatusView } from '../orchestrator/messages.js';
import { NotFoundError, ValidationError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { getCorrelationId, toErrorResponse } from './middleware.js';

export type ToolCommands = Pick<
  BookingOrchestrator,
  | 'createRequest'
  | 'refineSearch'
  | 'submitSelection'
  | 'submitDetails'
  | 'uploadDocument'
  | 'updateTripStatus'
  | 'cancel'
  | 'getStatus'
>;

export interface ToolField {
  name: string;
  required: boolean;
}

export interface Tool {
  name: string;
  description: string;
  fields: ToolField[];
  execute(input: unknown, meta: EventMeta): Promise<unknown>;
}

/**
 * Bind a zod input schema to a tool implementation
 */
export function defineTool<Shape extends z.ZodRawShape>(definition: {
  name: string;
  description: string;
  schema: z.ZodObject<Shape>;
  run: (input: z.infer<z.ZodObject<Shape>>, meta: EventMeta) => Promise<unknown>;
}): Tool {
  const { schema } = definition;
  return {
    name: definition.name,
    description: definition.description,
    fields: Object.entries<z.ZodTypeAny>(schema.shape).map(([name, field]) => ({ name, required: !field.isOptional() })),
    execute: async (input, meta) => definition.run(schema.parse(input), meta),
  };
}

const requestId = z.string().min(1, 'request_id is required');
const sequence = z.number().int().nonnegative().optional();

export function createBookingTools(orchestrator: ToolCommands): Tool[] {
  return [
    defineTool({
      name: 'create_booking_request',
      description:
        'Open a booking request from an intent: intent_kind (truck_booking | trip_booking), route {origin, destination}, dates {start, end?}, party_count, budget, free_text_fields',
      schema: z.object({
        user_id: z.string().min(1, 'user_id is required'),
        intent_kind: z.string(),
        route: z.record(z.unknown()),
        dates: z.record(z.unknown()),
        party_count: z.number().optional(),
        budget: z.number().nullable().optional(),
        free_text_fields: z.record(z.unknown()).optional(),
      }),
      run: async ({ user_id, ...intent }, meta) => toStatusView(await orchestrator.createRequest(user_id, intent, meta)),
    }),
    defineTool({
      name: 'refine_search',
      description: 'Change route, dates, party size or budget of a request that has no offers yet and search again',
      schema: z.object({
        request_id: requestId,
        origin: z.string().optional(),
        destination: z.string().optional(),
        start_date: z.string().optional(),
        end_date: z.string().optional(),
        party_count: z.number().int().positive().optional(),
        budget: z.number().positive().nullable().optional(),
      }),
      run: async (input, meta) => {
        const request = await orchestrator.refineSearch(
          input.request_id,
          {
            origin: input.origin,
            destination: input.destination,
            dateWindow:
              input.start_date || input.end_date ? { start: input.start_date, end: input.end_date } : undefined,
            partyCount: input.party_count,
            budget: input.budget,
          },
          meta
        );
        return toStatusView(request);
      },
    }),
    defineTool({
      name: 'submit_selection',
      description: 'Choose one of the offered options by candidate_id or 1-based option_number',
      schema: z.object({
        request_id: requestId,
        candidate_id: z.string().min(1).optional(),
        option_number: z.number().int().positive().optional(),
        sequence,
      }),
      run: async (input, meta) => {
        if (input.candidate_id === undefined && input.option_number === undefined) {
          throw new ValidationError('Selection requires candidate_id or option_number', [
            { field: 'option_number', message: 'candidate_id or option_number is required' },
          ]);
        }
        const request = await orchestrator.submitSelection(
          input.request_id,
          { candidateId: input.candidate_id, optionNumber: input.option_number },
          { ...meta, sequence: input.sequence }
        );
        return toStatusView(request);
      },
    }),
    defineTool({
      name: 'submit_details',
      description:
        'Submit trip details: consigner, consignee, pickupAddress, deliveryAddress, parcelDimensions, weightKg, declaredValue, specialInstructions. An empty fields object re-submits the details on file',
      schema: z.object({
        request_id: requestId,
        fields: z.record(z.unknown()).default({}),
        sequence,
      }),
      run: async (input, meta) => {
        const submission = await orchestrator.submitDetails(input.request_id, input.fields, {
          ...meta,
          sequence: input.sequence,
        });
        return {
          ...toStatusView(submission.request),
          accepted: submission.accepted,
          rejected: submission.rejected,
          outstandingFields: submission.outstanding,
        };
      },
    }),
    defineTool({
      name: 'upload_document',
      description: 'Upload a required document (base64 content) for the user or the provider side',
      schema: z.object({
        request_id: requestId,
        party: z.enum(['user', 'provider']).default('user'),
        document_type: z.string().min(1),
        file_name: z.string().min(1),
        mime_type: z.string().min(1),
        content: z.string().min(1),
      }),
      run: async (input, meta) => {
        const submission = await orchestrator.uploadDocument(
          input.request_id,
          {
            party: input.party,
            type: input.document_type,
            fileName: input.file_name,
            mimeType: input.mime_type,
            content: input.content,
          },
          meta
        );
        return { ...toStatusView(submission.request), document: submission.document };
      },
    }),
    defineTool({
      name: 'update_trip_status',
      description: 'Record that the trip started (in_transit) or was delivered',
      schema: z.object({
        request_id: requestId,
        status: z.enum(['in_transit', 'delivered']),
        sequence,
      }),
      run: async (input, meta) =>
        toStatusView(
          await orchestrator.updateTripStatus(input.request_id, input.status, { ...meta, sequence: input.sequence })
        ),
    }),
    defineTool({
      name: 'cancel_booking_request',
      description: 'Cancel a booking request that has not finished',
      schema: z.object({
        request_id: requestId,
        reason: z.string().max(500).optional(),
        sequence,
      }),
      run: async (input, meta) =>
        toStatusView(
          await orchestrator.cancel(input.request_id, input.reason ?? null, { ...meta, sequence: input.sequence })
        ),
    }),
    defineTool({
      name: 'get_booking_status',
      description: 'Current state, offers, outstanding fields and documents of a request',
      schema: z.object({ request_id: requestId }),
      run: async (input) => toStatusView(await orchestrator.getStatus(input.request_id)),
    }),
  ];
}

export function createToolsRouter(tools: Tool[], logger: Logger): Router {
  const router = Router();
  const registry = new Map(tools.map((tool) => [tool.name, tool]));

  /**
   * GET /tools
   */
  router.get('/', (req: Request, res: Response): void => {
    res.status(200).json({
      tools: tools.map(({ name, description, fields }) => ({ name, description, fields })),
    });
  });

  /**
   * POST /tools/:name
   */
  router.post('/:name', async (req: Request, res: Response): Promise<void> => {
    const correlation = getCorrelationId(res);
    const tool = registry.get(req.params.name);

    try {
      if (!tool) {
        throw new NotFoundError(`Unknown tool '${req.params.name}'`);
      }
      const result = await tool.execute(req.body, { correlationId: correlation });
      res.status(200).json({ ok: true, result });
    } catch (error) {
      const { status, body } = toErrorResponse(error);
      if (status >= 500) {
        logger.error('Tool execution failed', {
          tool: req.params.name,
          error: error instanceof Error ? error.message : String(error),
          correlation_id: correlation,
        });
      } else {
        logger.warn('Tool call rejected', {
          tool: req.params.name,
          kind: body.kind,
          error: body.message,
          correlation_id: correlation,
        });
      }
      res.status(status).json({ ok: false, error: body });
    }
  });

  return router;
}
