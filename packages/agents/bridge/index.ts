export { McpBridge, McpToolRouter, scopeToolCaller, readToolResult, isTransportFailure } from './mcp-client.js';
export type { McpBridgeConfig, ToolCaller, ToolCallOptions, ToolServerUrls, ToolServerConnection, BridgeFactory } from './mcp-client.js';
export { AnthropicBackend, createAnthropicBackend } from './anthropic-backend.js';
export type { AnthropicBackendConfig } from './anthropic-backend.js';
export { OpenAiCompatibleBackend, createOpenAiCompatibleBackend } from './openai-compatible-backend.js';
export type { OpenAiCompatibleConfig } from './openai-compatible-backend.js';
export type { ReasoningBackend, CompletionRequest, CompletionOptions } from './reasoning-backend.js';
