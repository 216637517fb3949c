import { randomUUID } from 'crypto';
import { z } from 'zod';
import { log } from '../log';
import { renderSummaryEmail } from '../notifications/summaryTemplate';
import {
  type RegisteredTool,
  type ToolContext,
  type ToolName,
  type ToolOutcome,
  toolError,
} from './types';

const clientIdSchema = z.string().trim().min(1, 'client_id is required');

function defineTool<S extends z.ZodTypeAny>(
  name: ToolName,
  schema: S,
  run: (args: z.infer<S>, context: ToolContext) => Promise<ToolOutcome>,
): RegisteredTool {
  return {
    name,
    execute: async (rawArgs, context) => {
      const parsed = schema.safeParse(rawArgs);
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map((issue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`)
          .join(', ');
        return toolError('InvalidArguments', issues);
      }
      return run(parsed.data, context);
    },
  };
}

const lookupClient = defineTool(
  'lookup_client',
  z.object({ client_id: clientIdSchema }),
  async (args, { collaborators, callId }) => {
    const client = await collaborators.clients.lookupClient(args.client_id);
    if (!client) {
      log.info({ event: 'tool_client_not_found', call_id: callId, client_id: args.client_id }, 'client not found');
      return toolError('NotFound', `Client with ID ${args.client_id} not found`);
    }

    const [products, openCases] = await Promise.all([
      collaborators.clients.listClientProducts(client),
      collaborators.clients.listOpenCases(client),
    ]);

    return {
      ok: true,
      payload: {
        client_id: client.clientId,
        client_name: client.name,
        email: client.email,
        products: products.map((product) => ({ name: product.name, type: product.type })),
        open_cases: openCases.map((supportCase) => ({
          id: supportCase.id,
          description: supportCase.description,
          status: supportCase.status,
          created_date: supportCase.createdDate,
        })),
      },
    };
  },
);

const createSupportCase = defineTool(
  'create_support_case',
  z.object({
    client_id: clientIdSchema,
    description: z.string().trim().min(1, 'description is required'),
  }),
  async (args, { collaborators, callId, signal }) => {
    const client = await collaborators.clients.lookupClient(args.client_id);
    if (!client) {
      return toolError('NotFound', `Client with ID ${args.client_id} not found`);
    }
    if (signal.aborted) {
      return toolError('Cancelled', 'support case creation cancelled');
    }

    const caseId = await collaborators.clients.createSupportCase(client, args.description);
    log.info(
      { event: 'tool_support_case_created', call_id: callId, client_id: client.clientId, case_id: caseId },
      'support case created',
    );

    return {
      ok: true,
      payload: {
        case_id: caseId,
        client_name: client.name,
        description: args.description,
        status: 'open',
        message: `Support case #${caseId} created successfully for ${client.name}`,
      },
    };
  },
);

const sendConversationSummary = defineTool(
  'send_conversation_summary',
  z.object({
    client_id: clientIdSchema,
    conversation_summary: z.string().trim().min(1, 'conversation_summary is required'),
  }),
  async (args, { collaborators, callId, signal }) => {
    const client = await collaborators.clients.lookupClient(args.client_id);
    if (!client || !client.email) {
      return toolError('NotFound', `Client with ID ${args.client_id} not found or no email registered`);
    }
    if (signal.aborted) {
      return toolError('Cancelled', 'summary email cancelled');
    }

    const referenceId = randomUUID().slice(0, 13);
    const content = renderSummaryEmail({
      referenceId,
      clientId: client.clientId,
      clientName: client.name,
      clientEmail: client.email,
      summary: args.conversation_summary,
      supportEmail: collaborators.supportEmail,
    });

    const sent = await collaborators.notifier.sendSummaryEmail({ address: client.email, name: client.name }, content);
    log.info(
      { event: 'tool_summary_sent', call_id: callId, client_id: client.clientId, reference_id: referenceId },
      'conversation summary sent',
    );

    return {
      ok: true,
      payload: {
        message: `Summary sent successfully to ${client.name} (${client.email})`,
        reference_id: referenceId,
        message_id: sent.messageId,
      },
    };
  },
);

const BUILTIN_TOOLS = {
  lookup_client: lookupClient,
  create_support_case: createSupportCase,
  send_conversation_summary: sendConversationSummary,
} satisfies Record<ToolName, RegisteredTool>;

export const BUILTIN_TOOL_NAMES: ToolName[] = ['lookup_client', 'create_support_case', 'send_conversation_summary'];

export type ToolRegistry = ReadonlyMap<string, RegisteredTool>;

export function createToolRegistry(names: ToolName[] = BUILTIN_TOOL_NAMES): ToolRegistry {
  return new Map(names.map((name): [string, RegisteredTool] => [name, BUILTIN_TOOLS[name]]));
}
