export { defineTool, describeFields, type Tool, type ToolField, type ToolSpec } from './tool.js';
export { ToolRegistry, createToolRegistry, type ToolDescription } from './registry.js';
export { handleToolRequest, errorStatus, errorBody, type ToolResponse, type ErrorBody } from './handler.js';
export { createServer, startServer } from './server.js';
export { createToolContext, createDraftStore } from './setup.js';
export { resolveDraft, type ToolContext } from './tools/context.js';
