export { callTool, type FailurePayload, runTool, toFailurePayload } from './dispatch';
export { buildMcpServer, createMcpServer, type McpHandler, SERVER_INFO } from './server';
export { tools, toolTable } from './tools';
export { defineTool, type Tool, type ToolContext } from './types';
