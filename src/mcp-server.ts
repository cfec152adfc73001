// Set MCP mode to suppress stdout logging
process.env.MCP_MODE = 'true';

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { createRagService } from './services/rag';
import { DEFAULT_TOP_K, MAX_TOP_K } from './constants/rag';
import type { DocumentSource } from './types/index';
import { ValidationError, errorMessage } from './utils/errors';
import { error } from './utils/logger';

type ToolArguments = Record<string, unknown> | undefined;

function requireString(args: ToolArguments, key: string): string {
  const value = args?.[key];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError(`${key} parameter is required`);
  }
  return value;
}

function optionalString(args: ToolArguments, key: string): string | undefined {
  const value = args?.[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new ValidationError(`${key} must be a string`);
  }
  return value;
}

function optionalNumber(args: ToolArguments, key: string): number | undefined {
  const value = args?.[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number') {
    throw new ValidationError(`${key} must be a number`);
  }
  return value;
}

function optionalStringArray(args: ToolArguments, key: string): string[] | undefined {
  const value = args?.[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value) || !value.every(item => typeof item === 'string')) {
    throw new ValidationError(`${key} must be an array of strings`);
  }
  return value.filter((item): item is string => typeof item === 'string');
}

function documentSource(args: ToolArguments): DocumentSource {
  const text = optionalString(args, 'text');
  const path = optionalString(args, 'path');
  const url = optionalString(args, 'url');

  if (text !== undefined) {
    return { kind: 'text', name: optionalString(args, 'name') ?? 'inline text', text };
  }
  if (path !== undefined) return { kind: 'file', path };
  if (url !== undefined) return { kind: 'url', url };
  throw new ValidationError('One of text, path or url is required');
}

function jsonContent(payload: unknown) {
  return {
    content: [
      {
        type: 'text' as const,
        text: JSON.stringify(payload, null, 2),
      },
    ],
  };
}

const ownerIdProperty = {
  type: 'string',
  description: 'Owner whose documents and sessions the call is scoped to',
};

const rag = createRagService();

const server = new Server(
  {
    name: 'docchat-rag',
    version: '1.0.0',
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

// List available tools
server.setRequestHandler(ListToolsRequestSchema, async () => {
  return {
    tools: [
      {
        name: 'rag_ingest',
        description:
          'Ingest a document (inline text, a local file or a URL) into the owner\'s knowledge base',
        inputSchema: {
          type: 'object',
          properties: {
            ownerId: ownerIdProperty,
            text: { type: 'string', description: 'Inline document text' },
            name: { type: 'string', description: 'Source name for inline text' },
            path: { type: 'string', description: 'Path of a .txt, .md, .html or .pdf file' },
            url: { type: 'string', description: 'URL to fetch' },
            documentId: {
              type: 'string',
              description: 'Document id to create or replace (derived from the source when omitted)',
            },
          },
          required: ['ownerId'],
        },
      },
      {
        name: 'rag_ask',
        description:
          'Ask a question within a chat session and get an answer grounded in the owner\'s documents',
        inputSchema: {
          type: 'object',
          properties: {
            ownerId: ownerIdProperty,
            sessionId: { type: 'string', description: 'Chat session id' },
            message: { type: 'string', description: 'The question or follow-up' },
            documentIds: {
              type: 'array',
              items: { type: 'string' },
              description: 'Restrict retrieval to these documents',
            },
          },
          required: ['ownerId', 'sessionId', 'message'],
        },
      },
      {
        name: 'rag_reset_session',
        description: 'Forget a chat session and its history',
        inputSchema: {
          type: 'object',
          properties: {
            ownerId: ownerIdProperty,
            sessionId: { type: 'string', description: 'Chat session id' },
          },
          required: ['ownerId', 'sessionId'],
        },
      },
      {
        name: 'rag_search',
        description: 'Search the owner\'s documents for chunks semantically similar to a query',
        inputSchema: {
          type: 'object',
          properties: {
            ownerId: ownerIdProperty,
            query: { type: 'string', description: 'The search query text' },
            topK: {
              type: 'number',
              description: `Number of results to return (default: ${DEFAULT_TOP_K}, max: ${MAX_TOP_K})`,
              default: DEFAULT_TOP_K,
            },
            documentIds: {
              type: 'array',
              items: { type: 'string' },
              description: 'Restrict the search to these documents',
            },
          },
          required: ['ownerId', 'query'],
        },
      },
      {
        name: 'rag_delete_document',
        description: 'Delete a document and all of its chunks',
        inputSchema: {
          type: 'object',
          properties: {
            ownerId: ownerIdProperty,
            documentId: { type: 'string', description: 'Id of the document to delete' },
          },
          required: ['ownerId', 'documentId'],
        },
      },
      {
        name: 'rag_list_documents',
        description: 'List the owner\'s documents with their ingestion status',
        inputSchema: {
          type: 'object',
          properties: {
            ownerId: ownerIdProperty,
          },
          required: ['ownerId'],
        },
      },
      {
        name: 'rag_status',
        description: 'Get the status of the owner\'s knowledge base and the configured models',
        inputSchema: {
          type: 'object',
          properties: {
            ownerId: ownerIdProperty,
          },
          required: ['ownerId'],
        },
      },
    ],
  };
});

// Handle tool calls
server.setRequestHandler(CallToolRequestSchema, async request => {
  const { name, arguments: args } = request.params;

  try {
    const ownerId = requireString(args, 'ownerId');

    switch (name) {
      case 'rag_ingest': {
        const documentId = optionalString(args, 'documentId');
        const document = await rag.ingest(documentSource(args), ownerId, documentId ? { documentId } : {});
        return jsonContent(document);
      }

      case 'rag_ask': {
        const documentIds = optionalStringArray(args, 'documentIds');
        const result = await rag.ask(
          requireString(args, 'sessionId'),
          requireString(args, 'message'),
          ownerId,
          documentIds ? { documentIds } : {}
        );
        return jsonContent(result);
      }

      case 'rag_reset_session': {
        const sessionId = requireString(args, 'sessionId');
        return jsonContent({ sessionId, reset: rag.resetSession(ownerId, sessionId) });
      }

      case 'rag_search': {
        const topK = optionalNumber(args, 'topK');
        const documentIds = optionalStringArray(args, 'documentIds');
        const response = await rag.search(requireString(args, 'query'), ownerId, {
          ...(topK !== undefined ? { topK } : {}),
          ...(documentIds ? { documentIds } : {}),
        });
        return jsonContent({
          query: response.query,
          results: response.results.map(result => ({
            chunk_id: result.chunk.id,
            document_id: result.chunk.documentId,
            source: result.chunk.source,
            chunk_index: result.chunk.index,
            chunk_text: result.chunk.text,
            similarity: result.score,
          })),
          took_ms: response.took_ms,
        });
      }

      case 'rag_delete_document': {
        const documentId = requireString(args, 'documentId');
        return jsonContent({ documentId, deleted: rag.deleteDocument(documentId, ownerId) });
      }

      case 'rag_list_documents':
        return jsonContent({ documents: rag.listDocuments(ownerId) });

      case 'rag_status':
        return jsonContent(rag.status(ownerId));

      default:
        throw new ValidationError(`Unknown tool: ${name}`);
    }
  } catch (err) {
    return {
      ...jsonContent({
        error: errorMessage(err),
        type: err instanceof Error ? err.name : 'Error',
      }),
      isError: true,
    };
  }
});

// Start the server
async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  // Server is now running - no logging needed in MCP mode
}

main().catch(err => {
  error('Fatal error:', err);
  rag.close();
  process.exit(1);
});
