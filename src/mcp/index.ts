/**
 * MCP server for npc-recall
 *
 * Lets an LLM agent read and record NPC memory via Model Context Protocol.
 */

export { runMcpServer, runTool, callTool, TOOLS } from './server.js';
export type { ToolResult } from './server.js';
