import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import type { ListToolsResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import type { Logger } from 'winston';
import { ConfigurationError } from '../errors/ErrorHandling.js';
import { parseToolDefinition } from '../responses/ToolDefinitionParser.js';
import type { ToolDescriptor } from '../responses/types.js';

export interface MCPServerConfig {
  name: string;
  command: string;
  args?: string[];
  env?: Record<string, string>;
  timeoutMs?: number;
}

export interface ToolRegistration {
  qualifiedName: string;
  server: string;
  toolName: string;
  tool: Tool;
}

export interface MCPToolSourceOptions {
  logger?: Logger;
  /** Prefix tool names with `<server>__` (default true) */
  qualifyNames?: boolean;
  defaultTimeoutMs?: number;
}

/**
 * Discovers tools exposed by MCP servers so they can be offered to the responses API.
 */
export class MCPToolSource {
  private clients: Map<string, Client> = new Map();
  private registrations: ToolRegistration[] = [];
  private configByServer: Map<string, MCPServerConfig> = new Map();

  constructor(
    private readonly configs: MCPServerConfig[],
    private readonly options: MCPToolSourceOptions = {},
  ) {}

  public async initialize(): Promise<void> {
    for (const config of this.configs) {
      if (this.configByServer.has(config.name)) {
        throw new ConfigurationError(`Duplicate MCP server name: ${config.name}`, {
          server: config.name,
        });
      }
      this.configByServer.set(config.name, config);
      await this.initializeServer(config);
    }
  }

  private async initializeServer(config: MCPServerConfig): Promise<void> {
    const envEntries = Object.entries({
      ...process.env,
      ...config.env,
    }).filter((entry): entry is [string, string] => typeof entry[1] === 'string');

    const transport = new StdioClientTransport({
      command: config.command,
      args: config.args ?? [],
      env: Object.fromEntries(envEntries),
    });

    const client = new Client(
      {
        name: 'responses-bridge-tool-source',
        version: '1.0.0',
      },
      {
        capabilities: {},
      },
    );

    this.options.logger?.info(`Connecting to MCP server '${config.name}'`);

    await client.connect(transport);
    this.clients.set(config.name, client);

    const timeoutMs = config.timeoutMs ?? this.options.defaultTimeoutMs;
    const listing = client.listTools();
    const toolsResponse =
      timeoutMs && timeoutMs > 0
        ? await this.withTimeout(listing, timeoutMs, `${config.name} listTools`)
        : await listing;

    this.register(config.name, toolsResponse);
  }

  private register(serverName: string, toolsResponse: ListToolsResult): void {
    const qualify = this.options.qualifyNames ?? true;

    for (const tool of toolsResponse.tools) {
      this.registrations.push({
        qualifiedName: qualify ? `${serverName}__${tool.name}` : tool.name,
        server: serverName,
        toolName: tool.name,
        tool,
      });
    }

    this.options.logger?.info(
      `Discovered ${toolsResponse.tools.length} tools on MCP server '${serverName}'`,
    );
  }

  public getRegisteredTools(): ToolRegistration[] {
    return [...this.registrations];
  }

  /** Discovered tools as descriptors, in server then listing order. */
  public getToolDescriptors(): ToolDescriptor[] {
    return this.registrations.map((registration, index) =>
      parseToolDefinition({ ...registration.tool, name: registration.qualifiedName }, index),
    );
  }

  public listServers(): string[] {
    return Array.from(this.clients.keys());
  }

  public async close(): Promise<void> {
    for (const client of this.clients.values()) {
      await client.close();
    }
    this.clients.clear();
    this.registrations = [];
    this.configByServer.clear();
  }

  private async withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new Error(`${label} timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      promise
        .then((value) => {
          clearTimeout(timer);
          resolve(value);
        })
        .catch((err: unknown) => {
          clearTimeout(timer);
          reject(err);
        });
    });
  }
}
