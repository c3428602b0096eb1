import fs from 'fs';
import path from 'path';
import { MCPToolSource } from '../bridge/MCPToolSource.js';
import { loadBridgeConfig, toServerConfigs } from '../config/BridgeConfig.js';
import { describeError } from '../errors/ErrorHandling.js';
import type { Logger } from '../logging/Logger.js';
import { verifyTools } from '../responses/ToolCompatibilityVerifier.js';
import { parseToolDefinitions } from '../responses/ToolDefinitionParser.js';
import { normalizeTools } from '../responses/ToolSchemaNormalizer.js';

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  cwd: string;
  logger?: Logger;
}

export const USAGE = [
  'Usage: responses-bridge <command> [file]',
  '',
  'Commands:',
  '  convert <file>  Convert a JSON list of tool definitions to responses API tools',
  '  verify <file>   Check tool definitions for responses API compatibility',
  '  discover        Collect and convert tools from the configured MCP servers',
].join('\n');

function readJsonFile(file: string, cwd: string): unknown {
  return JSON.parse(fs.readFileSync(path.resolve(cwd, file), 'utf-8'));
}

function convertCommand(file: string, io: CliIO): number {
  const tools = normalizeTools(parseToolDefinitions(readJsonFile(file, io.cwd)));
  io.stdout(JSON.stringify(tools, null, 2));
  return 0;
}

function verifyCommand(file: string, io: CliIO): number {
  const raw = readJsonFile(file, io.cwd);
  const reports = verifyTools(Array.isArray(raw) ? raw : [raw]);

  for (const report of reports) {
    if (report.valid) {
      io.stdout(`OK   ${report.name}`);
      continue;
    }
    io.stdout(`FAIL ${report.name}`);
    for (const issue of report.issues) {
      io.stdout(`     - ${issue}`);
    }
  }

  const failed = reports.filter((report) => !report.valid).length;
  io.stdout(`${reports.length - failed}/${reports.length} tools compatible`);
  return failed === 0 ? 0 : 1;
}

async function discoverCommand(io: CliIO): Promise<number> {
  const config = loadBridgeConfig(io.cwd);
  const source = new MCPToolSource(toServerConfigs(config), {
    logger: io.logger,
    qualifyNames: config.qualifyToolNames,
    defaultTimeoutMs: config.timeoutMs,
  });

  try {
    await source.initialize();
    const tools = normalizeTools(source.getToolDescriptors());
    io.stdout(JSON.stringify(tools, null, 2));
    return 0;
  } finally {
    await source.close();
  }
}

/**
 * Run one CLI command and return its exit code. Errors are reported on stderr.
 */
export async function runCli(argv: string[], io: CliIO): Promise<number> {
  const [command, file] = argv;

  try {
    switch (command) {
      case 'convert':
      case 'verify':
        if (!file) {
          io.stderr(`Missing file argument for '${command}'\n\n${USAGE}`);
          return 2;
        }
        return command === 'convert' ? convertCommand(file, io) : verifyCommand(file, io);
      case 'discover':
        return await discoverCommand(io);
      default:
        io.stderr(USAGE);
        return 2;
    }
  } catch (error) {
    io.logger?.error(`Command '${command}' failed`, { error: describeError(error) });
    io.stderr(describeError(error));
    return 1;
  }
}
