import fs from 'fs';
import os from 'os';
import path from 'path';
import { USAGE, runCli } from '../../src/cli/commands.js';

const fixturesDir = path.join(__dirname, '..', 'fixtures');

function captureIO(cwd: string = fixturesDir) {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    io: {
      stdout: (text: string) => stdout.push(text),
      stderr: (text: string) => stderr.push(text),
      cwd,
    },
  };
}

describe('runCli', () => {
  it('converts a tool file into closed responses API tools', async () => {
    const { io, stdout, stderr } = captureIO();

    const code = await runCli(['convert', 'tools.json'], io);

    expect(code).toBe(0);
    expect(stderr).toEqual([]);
    expect(JSON.parse(stdout.join('\n'))).toEqual([
      {
        type: 'function',
        name: 'read_file',
        description: 'Read a file',
        parameters: {
          type: 'object',
          properties: { path: { type: 'string' } },
          additionalProperties: false,
          required: ['path'],
        },
      },
      {
        type: 'function',
        name: 'list_dir',
        description: 'List a directory',
        parameters: {
          type: 'object',
          properties: { dir: { type: 'string' }, depth: { type: 'integer' } },
          required: ['dir'],
          additionalProperties: false,
        },
      },
    ]);
  });

  it('reports duplicate tool names', async () => {
    const { io, stdout, stderr } = captureIO();

    const code = await runCli(['convert', 'duplicate-tools.json'], io);

    expect(code).toBe(1);
    expect(stdout).toEqual([]);
    expect(stderr).toEqual([
      'DuplicateToolNameError [DUPLICATE_TOOL_NAME]: Duplicate tool name: search',
    ]);
  });

  it('verifies tool definitions and lists the issues', async () => {
    const { io, stdout } = captureIO();

    const code = await runCli(['verify', 'verify-tools.json'], io);

    expect(code).toBe(1);
    expect(stdout).toEqual([
      'OK   search',
      'FAIL bad tool',
      "     - Missing or incorrect 'type' field (should be 'function')",
      "     - Name 'bad tool' must match ^[a-zA-Z0-9_-]{1,64}$",
      "     - Missing 'description' field",
      "     - parameters: 'additionalProperties' must be false",
      "     - parameters: missing 'required' list",
      '1/2 tools compatible',
    ]);
  });

  it('requires a file for convert and verify', async () => {
    const { io, stderr } = captureIO();

    expect(await runCli(['verify'], io)).toBe(2);
    expect(stderr).toEqual([`Missing file argument for 'verify'\n\n${USAGE}`]);
  });

  it('prints usage for an unknown command', async () => {
    const { io, stderr } = captureIO();

    expect(await runCli(['serve'], io)).toBe(2);
    expect(stderr).toEqual([USAGE]);
  });

  it('fails on a missing file', async () => {
    const { io, stdout, stderr } = captureIO();

    expect(await runCli(['convert', 'missing.json'], io)).toBe(1);
    expect(stdout).toEqual([]);
    expect(stderr).toHaveLength(1);
    expect(stderr[0]).toContain('ENOENT');
  });

  it('discovers nothing when no servers are configured', async () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'responses-bridge-cli-'));
    try {
      const { io, stdout } = captureIO(tmpDir);

      expect(await runCli(['discover'], io)).toBe(0);
      expect(stdout).toEqual(['[]']);
    } finally {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  });
});
