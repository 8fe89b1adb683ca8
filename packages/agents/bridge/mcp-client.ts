// MCP Client Bridge: connects specialists to the domain tool servers
// One bridge per server over Streamable HTTP; the router picks the server for each tool

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import { McpError } from '@modelcontextprotocol/sdk/types.js';
import { DOMAIN_TOOLS, TOOL_SERVERS, type ToolServer } from '../config/domain-tools.js';
import type { SpecialistDomain } from '../types/findings.js';
import { ToolCallError, ToolTransportError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('McpBridge');

export interface ToolCallOptions {
  signal?: AbortSignal;
}

export type ToolCaller = (
  toolName: string,
  params: Record<string, unknown>,
  options?: ToolCallOptions,
) => Promise<unknown>;

export interface McpBridgeConfig {
  /** Server name used in errors and logs */
  server: string;
  url: string;
  /** Sent as a bearer token when set */
  token?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isTextContent(value: unknown): value is { type: 'text'; text: string } {
  return isRecord(value) && value.type === 'text' && typeof value.text === 'string';
}

/** Unwrap an MCP tool result: text content is parsed as JSON when it is JSON */
export function readToolResult(toolName: string, result: unknown): unknown {
  if (!isRecord(result)) return result;

  const content = result.content;
  const text = Array.isArray(content)
    ? content.filter(isTextContent).map((item) => item.text).join('\n')
    : undefined;

  if (result.isError === true) {
    throw new ToolCallError(toolName, text || 'tool reported an error');
  }
  if (text === undefined) return 'toolResult' in result ? result.toolResult : result;

  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/**
 * A JSON-RPC error is the server answering; anything else thrown by the client
 * (HTTP status, lost session, refused connection) means the transport is gone.
 */
export function isTransportFailure(err: unknown, signal?: AbortSignal): boolean {
  if (signal?.aborted) return false;
  return !(err instanceof McpError);
}

/** What the router needs from one server connection */
export interface ToolServerConnection {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  callTool(toolName: string, params: Record<string, unknown>, options?: ToolCallOptions): Promise<unknown>;
}

export type BridgeFactory = (config: McpBridgeConfig) => ToolServerConnection;

export class McpBridge implements ToolServerConnection {
  readonly server: string;
  private readonly client: Client;
  private readonly config: McpBridgeConfig;
  private connected = false;

  constructor(config: McpBridgeConfig) {
    this.server = config.server;
    this.config = config;
    this.client = new Client(
      { name: 'alert-triage', version: '1.0.0' },
      { capabilities: {} },
    );
  }

  async connect(): Promise<void> {
    if (this.connected) return;

    const headers: Record<string, string> = {};
    if (this.config.token) headers.Authorization = `Bearer ${this.config.token}`;

    const transport = new StreamableHTTPClientTransport(new URL(this.config.url), {
      requestInit: { headers },
    });

    await this.client.connect(transport);
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    if (!this.connected) return;
    await this.client.close();
    this.connected = false;
  }

  async callTool(toolName: string, params: Record<string, unknown>, options: ToolCallOptions = {}): Promise<unknown> {
    if (!this.connected) throw new ToolCallError(toolName, `MCP bridge "${this.server}" not connected`);

    let result: unknown;
    try {
      result = await this.client.callTool({ name: toolName, arguments: params }, undefined, {
        signal: options.signal,
      });
    } catch (err) {
      if (isTransportFailure(err, options.signal)) {
        throw new ToolTransportError(toolName, errorMessage(err), { cause: err });
      }
      throw new ToolCallError(toolName, errorMessage(err), { cause: err });
    }
    return readToolResult(toolName, result);
  }
}

export type ToolServerUrls = Partial<Record<ToolServer, string>>;

/**
 * Routes tool calls to the server that hosts them.
 * Bridges connect on first use. A failed connect, or a transport failure on a
 * connected bridge, drops the bridge so the next call reconnects.
 */
export class McpToolRouter {
  private readonly bridges = new Map<ToolServer, Promise<ToolServerConnection>>();

  constructor(
    private readonly urls: ToolServerUrls,
    private readonly token?: string,
    private readonly createBridge: BridgeFactory = (config) => new McpBridge(config),
  ) {}

  isConfigured(server: ToolServer): boolean {
    return Boolean(this.urls[server]);
  }

  readonly callTool: ToolCaller = async (toolName, params, options) => {
    const server = TOOL_SERVERS[toolName];
    if (!server) throw new ToolCallError(toolName, 'no tool server hosts this tool');

    const url = this.urls[server];
    if (!url) throw new ToolCallError(toolName, `tool server "${server}" is not configured`);

    const pending = this.connection(server, url);
    let bridge: ToolServerConnection;
    try {
      bridge = await pending;
    } catch (err) {
      throw new ToolCallError(toolName, `tool server "${server}" unreachable: ${errorMessage(err)}`, { cause: err });
    }

    try {
      return await bridge.callTool(toolName, params, options);
    } catch (err) {
      if (err instanceof ToolTransportError && this.bridges.get(server) === pending) {
        this.bridges.delete(server);
        log('warn', 'Tool server connection lost', { server, error: errorMessage(err) });
        await bridge.disconnect().catch((closeErr: unknown) => {
          log('warn', 'Disconnect failed', { server, error: errorMessage(closeErr) });
        });
      }
      throw err;
    }
  };

  async close(): Promise<void> {
    const pending = [...this.bridges.values()];
    this.bridges.clear();
    const results = await Promise.allSettled(pending.map(async (p) => (await p).disconnect()));
    for (const result of results) {
      if (result.status === 'rejected') log('warn', 'Disconnect failed', { error: errorMessage(result.reason) });
    }
  }

  private connection(server: ToolServer, url: string): Promise<ToolServerConnection> {
    const existing = this.bridges.get(server);
    if (existing) return existing;

    const created = this.createBridge({ server, url, token: this.token });
    const pending = created.connect().then(() => {
      log('info', 'Connected to tool server', { server, url });
      return created;
    });
    pending.catch((err: unknown) => {
      if (this.bridges.get(server) === pending) this.bridges.delete(server);
      log('warn', 'Tool server connection failed', { server, error: errorMessage(err) });
    });
    this.bridges.set(server, pending);
    return pending;
  }
}

/** Restrict a tool caller to one specialist's allowed tools */
export function scopeToolCaller(caller: ToolCaller, domain: SpecialistDomain): ToolCaller {
  const allowed = new Set(DOMAIN_TOOLS[domain]);
  return (toolName, params, options) => {
    if (!allowed.has(toolName)) {
      return Promise.reject(new ToolCallError(toolName, `not available to the ${domain} specialist`));
    }
    return caller(toolName, params, options);
  };
}
