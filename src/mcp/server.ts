/**
 * npc-recall MCP server
 *
 * Exposes an NPC's memory to MCP clients: context retrieval, read-only
 * memory queries, and the two mutations an agent is allowed to make
 * (recording an episode and setting world state).
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { withSession } from '../core/session.js';
import type { RecallSession } from '../core/session.js';
import {
  GetBeliefsArgsSchema,
  GetCanonicalFactsArgsSchema,
  GetMemoriesArgsSchema,
  GetWorldStateArgsSchema,
  getBeliefs,
  getCanonicalFacts,
  getMemories,
  getWorldState,
} from '../functions/context-functions.js';
import { formatMemoriesForContext } from '../memory/retriever.js';
import { EPISODE_TYPES } from '../memory/types.js';
import type { LogFn } from '../memory/types.js';

const MAX_CONTENT_LENGTH = 2000;
const MAX_QUERY_LENGTH = 500;

const RecallContextSchema = z.object({
  query: z.string().max(MAX_QUERY_LENGTH).default('').describe('What the player just said or the situation'),
  topics: z.array(z.string()).optional().describe('Topic filters'),
});

const RememberSchema = z.object({
  text: z.string().trim().min(1).max(MAX_CONTENT_LENGTH).describe('What happened'),
  speaker: z.string().trim().min(1).max(100).optional().describe('Who said it, for dialogue'),
  episodeType: z.enum(EPISODE_TYPES).optional().describe('Kind of episode'),
  significance: z.number().min(0).max(1).optional().describe('Importance (0-1)'),
});

const SetWorldStateSchema = z.object({
  key: z.string().trim().min(1).max(200).describe('State key'),
  value: z.string().max(MAX_CONTENT_LENGTH).describe('New value'),
});

export interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

function text(value: string): ToolResult {
  return { content: [{ type: 'text', text: value }] };
}

function json(value: unknown): ToolResult {
  return text(JSON.stringify(value, null, 2));
}

export const TOOLS = [
  {
    name: 'recall_context',
    description: `Get the ranked memory context for the NPC's next line.

Call this before generating dialogue. Returns canonical facts, world state,
the most relevant episodic memories and the NPC's beliefs.`,
    inputSchema: {
      type: 'object' as const,
      properties: {
        query: { type: 'string', description: 'What the player just said or the situation' },
        topics: { type: 'array', items: { type: 'string' }, description: 'Topic filters' },
      },
      required: [],
    },
  },
  {
    name: 'get_memories',
    description: 'List active episodic memories, newest first.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        limit: { type: 'integer', description: 'Maximum number of memories (default 10)' },
        minSignificance: { type: 'number', description: 'Minimum significance (0-1)' },
      },
      required: [],
    },
  },
  {
    name: 'get_beliefs',
    description: 'List the NPC\'s beliefs with their confidence.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        limit: { type: 'integer', description: 'Maximum number of beliefs (default 10)' },
        minConfidence: { type: 'number', description: 'Minimum confidence (0-1)' },
        subject: { type: 'string', description: 'Only beliefs about this subject' },
      },
      required: [],
    },
  },
  {
    name: 'get_world_state',
    description: 'Read world state entries.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        keys: { type: 'array', items: { type: 'string' }, description: 'Specific keys to read' },
      },
      required: [],
    },
  },
  {
    name: 'get_canonical_facts',
    description: 'List canonical facts. These are authoritative and cannot be changed.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        domain: { type: 'string', description: 'Only facts in this domain' },
      },
      required: [],
    },
  },
  {
    name: 'remember',
    description: `Record something that happened as an episodic memory.

Use this after a validated exchange so the NPC remembers it later.`,
    inputSchema: {
      type: 'object' as const,
      properties: {
        text: { type: 'string', description: 'What happened' },
        speaker: { type: 'string', description: 'Who said it, for dialogue' },
        episodeType: { type: 'string', enum: [...EPISODE_TYPES], description: 'Kind of episode' },
        significance: { type: 'number', description: 'Importance (0-1)' },
      },
      required: ['text'],
    },
  },
  {
    name: 'set_world_state',
    description: 'Set a world state value (e.g. a door opening or a quest stage).',
    inputSchema: {
      type: 'object' as const,
      properties: {
        key: { type: 'string', description: 'State key' },
        value: { type: 'string', description: 'New value' },
      },
      required: ['key', 'value'],
    },
  },
];

const MUTATING_TOOLS = new Set(['remember', 'set_world_state']);

/**
 * Runs one tool against an open session. Throws on invalid arguments or
 * rejected mutations; `runTool` turns that into an error result.
 */
export function callTool(session: RecallSession, name: string, args: unknown): ToolResult {
  switch (name) {
    case 'recall_context': {
      const input = RecallContextSchema.parse(args ?? {});
      const context = session.retriever.retrieveContext(input.query, input.topics);

      if (!context.hasContent) {
        return text('No relevant memories found for this NPC.');
      }
      return text(formatMemoriesForContext(context));
    }

    case 'get_memories':
      return json(getMemories(session.store, GetMemoriesArgsSchema.parse(args ?? {})));

    case 'get_beliefs':
      return json(getBeliefs(session.store, GetBeliefsArgsSchema.parse(args ?? {})));

    case 'get_world_state':
      return json(getWorldState(session.store, GetWorldStateArgsSchema.parse(args ?? {})));

    case 'get_canonical_facts':
      return json(getCanonicalFacts(session.store, GetCanonicalFactsArgsSchema.parse(args ?? {})));

    case 'remember': {
      const input = RememberSchema.parse(args);
      const description = input.speaker ? `${input.speaker}: ${input.text}` : input.text;
      const entry = session.store.addEpisodicMemory({
        description,
        episodeType: input.episodeType ?? (input.speaker ? 'dialogue' : 'event'),
        participant: input.speaker,
        significance: input.significance,
      }, 'validated_output');

      return text(`✓ Remembered: "${description.slice(0, 50)}${description.length > 50 ? '...' : ''}"\nID: ${entry.id}`);
    }

    case 'set_world_state': {
      const input = SetWorldStateSchema.parse(args);
      const entry = session.store.setWorldState(input.key, input.value, 'game_system');
      return text(`✓ ${entry.key} = ${entry.value}`);
    }

    default:
      return { ...text(`Unknown tool: ${name}`), isError: true };
  }
}

/**
 * Loads the project's memory, runs the tool and saves when it mutated.
 * Each call sees the database as the CLI last left it.
 */
export function runTool(projectRoot: string, name: string, args: unknown, onLog?: LogFn): ToolResult {
  try {
    return withSession((session) => callTool(session, name, args), {
      projectRoot,
      mutate: MUTATING_TOOLS.has(name),
      onLog,
    });
  } catch (error) {
    return {
      ...text(`Error: ${error instanceof Error ? error.message : 'Unknown error'}`),
      isError: true,
    };
  }
}

export async function runMcpServer(projectRoot: string, version: string): Promise<void> {
  const server = new Server(
    {
      name: 'npc-recall',
      version,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: TOOLS };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return runTool(projectRoot, name, args);
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);

  const shutdown = () => {
    server.close().then(
      () => process.exit(0),
      () => process.exit(1)
    );
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
