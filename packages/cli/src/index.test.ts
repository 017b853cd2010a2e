import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';

import { ConfigError, ParseError, type GroupDescription } from '@attrgroups/core';
import { handleCliError, main, program } from './index.js';
import { stripAnsi } from './render.js';

const TEAM: GroupDescription = {
  name: 'team',
  attributes: {
    name: {},
    lead: {
      group: {
        name: 'lead',
        attributes: {
          address: { group: { name: 'address', attributes: { city: {} } } },
          name: {},
        },
      },
    },
  },
};

const NAME_ONLY: GroupDescription = { name: 'team', attributes: { name: {} } };
const ZIP_ONLY: GroupDescription = { name: 'other', attributes: { zip: {} } };

let dir: string;

async function writeFixture(file: string, content: unknown): Promise<string> {
  const target = path.join(dir, file);
  await writeFile(
    target,
    typeof content === 'string' ? content : JSON.stringify(content),
    'utf8'
  );
  return target;
}

async function run(args: string[]): Promise<string> {
  const chunks: string[] = [];
  const stdoutSpy = vi
    .spyOn(process.stdout, 'write')
    .mockImplementation((chunk: unknown) => {
      chunks.push(String(chunk));
      return true;
    });
  try {
    await program.parseAsync(args, { from: 'user' });
  } finally {
    stdoutSpy.mockRestore();
  }
  return chunks.join('');
}

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), 'attrgroups-cli-'));
});

afterEach(async () => {
  process.exitCode = undefined;
  vi.restoreAllMocks();
  await rm(dir, { recursive: true, force: true });
});

describe('CLI inspect command', () => {
  it('lists every attribute path, sorted', async () => {
    const file = await writeFixture('team.json', TEAM);

    expect(await run(['inspect', file])).toBe(
      'lead\nlead.address\nlead.address.city\nlead.name\nname\n'
    );
  });

  it('rejects a file that is not a group description', async () => {
    const file = await writeFixture('broken.json', '{"attributes":{}}');

    await expect(run(['inspect', file])).rejects.toBeInstanceOf(ParseError);
  });
});

describe('CLI compare command', () => {
  it('reports the relation of the first file to the second', async () => {
    const team = await writeFixture('team.json', TEAM);
    const names = await writeFixture('names.json', NAME_ONLY);

    expect(await run(['compare', team, names])).toBe('superset\n');
    expect(await run(['compare', names, team])).toBe('subset\n');
    expect(await run(['compare', team, team])).toBe('equal\n');
    expect(process.exitCode).toBeUndefined();
  });

  it('sets a failing exit code for incomparable groups', async () => {
    const names = await writeFixture('names.json', NAME_ONLY);
    const zip = await writeFixture('zip.json', ZIP_ONLY);

    expect(await run(['compare', names, zip])).toBe('incomparable\n');
    expect(process.exitCode).toBe(1);
  });
});

describe('CLI specialize command', () => {
  it('prints the specialized group', async () => {
    const file = await writeFixture('team.json', TEAM);

    expect(await run(['specialize', file, '--kind', 'fetch'])).toBe(
      'FetchGroup(team){name, lead{address{city}, name}}\n'
    );
    expect(await run(['specialize', file, '-k', 'load'])).toBe(
      'LoadGroup(team){name, lead{address{city}, name}}\n'
    );
  });
});

describe('CLI error handling', () => {
  it('renders the error and exits with its exit code', () => {
    process.env.NO_COLOR = '1';
    const errors: unknown[] = [];
    vi.spyOn(console, 'error').mockImplementation((message: unknown) => {
      errors.push(message);
    });
    const exitSpy = vi
      .spyOn(process, 'exit')
      .mockImplementation((code?: number | string | null) => {
        throw new Error(`EXIT:${String(code ?? 0)}`);
      });

    try {
      expect(() =>
        handleCliError(new ConfigError('bad depth', 'validation.maxDepth'))
      ).toThrow('EXIT:50');
    } finally {
      delete process.env.NO_COLOR;
    }
    expect(exitSpy).toHaveBeenCalledWith(50);
    expect(errors.map((entry) => stripAnsi(String(entry)))).toEqual([
      'Error E300: bad depth',
    ]);
  });

  it('exits with the internal error code when a file is missing', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation(
      (code?: number | string | null) => {
        throw new Error(`EXIT:${String(code ?? 0)}`);
      }
    );

    await expect(
      main([
        'node',
        'attrgroups',
        'inspect',
        path.join(dir, 'non-existent.json'),
      ])
    ).rejects.toThrow('EXIT:99');
  });

  it('exits with the parse error code for invalid JSON', async () => {
    const file = await writeFixture('invalid.json', '{ not json');
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation(
      (code?: number | string | null) => {
        throw new Error(`EXIT:${String(code ?? 0)}`);
      }
    );

    await expect(main(['node', 'attrgroups', 'inspect', file])).rejects.toThrow(
      'EXIT:60'
    );
  });
});
