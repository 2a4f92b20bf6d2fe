export { builtInTools, getTool, getToolDeclarations } from './registry.js';
export type { ToolDeclaration } from './registry.js';
export { executeTool, formatToolAnnouncement, toolResponseText } from './executor.js';
export type { ToolCallRequest, ToolResponse } from './executor.js';
export type { Tool, ToolContext, ToolName } from './types.js';
