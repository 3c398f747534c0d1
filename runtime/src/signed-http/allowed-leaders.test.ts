import { describe, it, expect, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SignedHttpError } from '../types/errors.js';
import { loadAllowedLeaders, parseAllowedLeaders } from './allowed-leaders.js';

const LONG_ID = `0x${'0'.repeat(62)}a1`;

function file(keys: Array<{ kid: number; public_key: string }>, leaderId = '0xa1') {
  return { version: 1, leaders: [{ leader_id: leaderId, keys }] };
}

describe('parseAllowedLeaders', () => {
  it('resolves keys by normalized leader id and kid', () => {
    const leaders = parseAllowedLeaders(file([{ kid: 0, public_key: 'AB'.repeat(32) }]));

    expect(leaders.leaderIds()).toEqual([LONG_ID]);
    expect(leaders.leaderPublicKey('0xa1', 0)).toEqual(new Uint8Array(32).fill(0xab));
    expect(leaders.invokerPublicKey(LONG_ID, 0)).toEqual(new Uint8Array(32).fill(0xab));
    expect(leaders.invokerPublicKey(LONG_ID, 1)).toBeUndefined();
    expect(leaders.invokerPublicKey('0xa2', 0)).toBeUndefined();
  });

  it('lets a later duplicate kid win', () => {
    const leaders = parseAllowedLeaders(
      file([
        { kid: 3, public_key: '01'.repeat(32) },
        { kid: 3, public_key: '02'.repeat(32) },
      ]),
    );
    expect(leaders.leaderPublicKey(LONG_ID, 3)).toEqual(new Uint8Array(32).fill(2));
  });

  it('rejects keys that are not 32 bytes of hex', () => {
    expect(() => parseAllowedLeaders(file([{ kid: 0, public_key: 'ab'.repeat(31) }]))).toThrow(
      'invalid allowed-leaders file: leaders.0.keys.0.public_key: public_key must be 32 bytes of hex',
    );
  });

  it('rejects other versions', () => {
    let caught: unknown;
    try {
      parseAllowedLeaders({ version: 2, leaders: [] });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(SignedHttpError);
    expect(caught instanceof SignedHttpError && caught.kind).toBe('InvalidAllowedLeadersFile');
  });
});

describe('loadAllowedLeaders', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir !== undefined) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('reads the file and remembers where it came from', async () => {
    dir = await mkdtemp(join(tmpdir(), 'allowed-leaders-'));
    const path = join(dir, 'allowed_leaders.json');
    await writeFile(path, JSON.stringify(file([{ kid: 0, public_key: '09'.repeat(32) }])));

    const leaders = await loadAllowedLeaders(path);

    expect(leaders.sourcePath).toBe(path);
    expect(leaders.leaderPublicKey('0xa1', 0)).toEqual(new Uint8Array(32).fill(9));
  });

  it('reports malformed JSON as an invalid file', async () => {
    dir = await mkdtemp(join(tmpdir(), 'allowed-leaders-'));
    const path = join(dir, 'allowed_leaders.json');
    await writeFile(path, '{"version": 1,');

    await expect(loadAllowedLeaders(path)).rejects.toThrow(/^invalid allowed-leaders file: /);
  });
});
