import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { protocolId } from '@pactwire/core';
import { EXIT_NEGATIVE, type ProgramIo, createProgram } from '../src/program.js';
import { createToolformer } from '../src/runner.js';
import {
  DOUBLE_IT_ADAPTER,
  DOUBLE_IT_DOCUMENT,
  RoleToolformer,
  type Role,
  type Script,
  TASK,
  TOOLS,
  agreeingScripts,
} from './fixtures/backend.js';

let dir: string;
let out: string[];
let err: string[];
let exitCode: number | undefined;

beforeEach(() => {
  dir = mkdtempSync(path.join(tmpdir(), 'pactwire-cli-'));
  out = [];
  err = [];
  exitCode = undefined;
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

function write(name: string, content: unknown): string {
  const file = path.join(dir, name);
  writeFileSync(file, typeof content === 'string' ? content : JSON.stringify(content));
  return file;
}

function io(scripts: Partial<Record<Role, Script>>): ProgramIo {
  return {
    out: (line) => out.push(line),
    err: (line) => err.push(line),
    setExitCode: (code) => {
      exitCode = code;
    },
    env: {},
    createToolformer: () => new RoleToolformer(scripts),
  };
}

async function run(programIo: ProgramIo, ...args: string[]): Promise<void> {
  await createProgram(programIo).parseAsync(args, { from: 'user' });
}

describe('pactwire check', () => {
  it('prints feasible and exits 0', async () => {
    const protocol = write('protocol.md', DOUBLE_IT_DOCUMENT);
    const tools = write('tools.json', TOOLS);
    await run(io({ checker: () => 'Everything is covered. Yes.' }), 'check', '--protocol', protocol, '--tools', tools);
    expect(out).toEqual(['feasible']);
    expect(exitCode).toBe(0);
  });

  it('prints not feasible and exits 2', async () => {
    const protocol = write('protocol.md', DOUBLE_IT_DOCUMENT);
    await run(io({ checker: () => 'A yes would be wrong here. No.' }), 'check', '--protocol', protocol);
    expect(out).toEqual(['not feasible']);
    expect(exitCode).toBe(EXIT_NEGATIVE);
  });

  it('reports failures with the command name and exits 1', async () => {
    const missing = path.join(dir, 'missing.md');
    await run(io({}), 'check', '--protocol', missing);
    expect(out).toEqual([]);
    expect(err).toHaveLength(1);
    expect(err[0].startsWith(`check failed: Cannot read protocol file ${missing}: `)).toBe(true);
    expect(exitCode).toBe(1);
  });

  it('names the missing API key variable', async () => {
    const config = write('pactwire.config.json', { backend: { provider: 'openai', model: 'gpt-test' } });
    const protocol = write('protocol.md', DOUBLE_IT_DOCUMENT);
    const programIo: ProgramIo = {
      ...io({}),
      createToolformer: (loaded, logger) => createToolformer(loaded, logger, {}),
    };
    await run(programIo, '--config', config, 'check', '--protocol', protocol);
    expect(err).toEqual(['check failed: Missing API key: environment variable OPENAI_API_KEY is not set']);
    expect(exitCode).toBe(1);
  });
});

describe('pactwire synthesize', () => {
  it('prints the adapter', async () => {
    const task = write('task.json', TASK);
    const protocol = write('protocol.md', DOUBLE_IT_DOCUMENT);
    await run(io(agreeingScripts), 'synthesize', '--task', task, '--protocol', protocol);
    expect(out).toEqual([DOUBLE_IT_ADAPTER]);
    expect(exitCode).toBe(0);
  });

  it('writes the adapter to a file', async () => {
    const task = write('task.json', TASK);
    const protocol = write('protocol.md', DOUBLE_IT_DOCUMENT);
    const target = path.join(dir, 'adapter.js');
    await run(io(agreeingScripts), 'synthesize', '--task', task, '--protocol', protocol, '--out', target);
    expect(readFileSync(target, 'utf8')).toBe(DOUBLE_IT_ADAPTER);
    expect(out).toEqual([]);
    expect(err).toEqual([`Adapter written to ${target}`]);
  });
});

describe('pactwire negotiate', () => {
  it('prints the written files and the verdict', async () => {
    const config = write('pactwire.config.json', { outputDir: path.join(dir, 'out') });
    const task = write('task.json', TASK);
    const tools = write('tools.json', TOOLS);
    await run(io(agreeingScripts), '--config', config, 'negotiate', '--task', task, '--tools', tools, '--synthesize');

    const id = protocolId(DOUBLE_IT_DOCUMENT);
    expect(out).toEqual([
      path.join(dir, 'out', `${id}.md`),
      path.join(dir, 'out', `${id}.adapter.js`),
      'feasible',
    ]);
    expect(err).toEqual(['Agreed on DoubleIt after 1 round(s)']);
    expect(exitCode).toBe(0);
  });

  it('prints no protocol agreed and exits 2 on exhaustion', async () => {
    const config = write('pactwire.config.json', {
      outputDir: path.join(dir, 'out'),
      negotiation: { maxRounds: 1 },
    });
    const task = write('task.json', TASK);
    await run(
      io({ sender: () => 'Shall we use JSON?', receiver: () => 'Maybe.' }),
      '--config',
      config,
      'negotiate',
      '--task',
      task,
    );
    expect(out).toEqual(['no protocol agreed']);
    expect(exitCode).toBe(EXIT_NEGATIVE);
  });
});
