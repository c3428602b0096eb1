import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../errors/ErrorHandling.js';
import type { MCPServerConfig } from '../bridge/MCPToolSource.js';

export const CONFIG_FILES = [
  'responses-bridge.config.json',
  'responses-bridge.config.example.json',
] as const;

export const BridgeConfigSchema = z.object({
  model: z.string().min(1).default('gpt-5'),
  baseUrl: z.string().url().default('https://api.openai.com/v1'),
  apiKey: z.string().min(1).optional(),
  instructions: z.string().optional(),
  timeoutMs: z.number().int().positive().optional(),
  qualifyToolNames: z.boolean().default(true),
  servers: z
    .array(
      z.object({
        name: z.string().min(1),
        command: z.string().min(1),
        args: z.array(z.string()).optional(),
        env: z.record(z.string()).optional(),
        timeoutMs: z.number().int().positive().optional(),
      }),
    )
    .default([]),
});

export type BridgeConfig = z.infer<typeof BridgeConfigSchema>;

export function parseBridgeConfig(
  raw: unknown,
  env: NodeJS.ProcessEnv = process.env,
): BridgeConfig {
  const result = BridgeConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError('Invalid bridge configuration', {
      issues: result.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
      ),
    });
  }

  const config = result.data;
  if (!config.apiKey && env.OPENAI_API_KEY) {
    config.apiKey = env.OPENAI_API_KEY;
  }
  return config;
}

/**
 * Load the first configuration file found in `cwd`, or defaults when there is none.
 */
export function loadBridgeConfig(
  cwd: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env,
): BridgeConfig {
  for (const file of CONFIG_FILES) {
    const configPath = path.resolve(cwd, file);
    if (!fs.existsSync(configPath)) continue;

    let json: unknown;
    try {
      json = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(`Failed to read config from ${file}`, {
        path: configPath,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
    return parseBridgeConfig(json, env);
  }

  return parseBridgeConfig({}, env);
}

export function toServerConfigs(config: BridgeConfig): MCPServerConfig[] {
  return config.servers.map((server) => ({
    name: server.name,
    command: server.command,
    args: server.args,
    env: server.env,
    timeoutMs: server.timeoutMs,
  }));
}
