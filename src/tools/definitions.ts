import type { ToolDefinition } from './types';

export const CUSTOMER_SERVICE_TOOLS: ToolDefinition[] = [
  {
    type: 'function',
    name: 'lookup_client',
    description:
      'Returns the client name, contracted products and open support cases given their client ID.',
    parameters: {
      type: 'object',
      properties: {
        client_id: {
          type: 'string',
          description: 'Client ID.',
        },
      },
      required: ['client_id'],
    },
  },
  {
    type: 'function',
    name: 'create_support_case',
    description: 'Creates a new support case for a client.',
    parameters: {
      type: 'object',
      properties: {
        client_id: {
          type: 'string',
          description: 'Client ID.',
        },
        description: {
          type: 'string',
          description: "Detailed description of the client's problem or request.",
        },
      },
      required: ['client_id', 'description'],
    },
  },
  {
    type: 'function',
    name: 'send_conversation_summary',
    description:
      'Sends a conversation summary via email to the client. Only use with existing clients before ending the call.',
    parameters: {
      type: 'object',
      properties: {
        client_id: {
          type: 'string',
          description: 'Client ID.',
        },
        conversation_summary: {
          type: 'string',
          description:
            'Detailed summary of the conversation, including reported problem, proposed solution and agreed next steps.',
        },
      },
      required: ['client_id', 'conversation_summary'],
    },
  },
];
