/**
 * Persisted client state: an optional identity key and the client's active
 * sessions, keyed by 32-byte session ids in hex.
 *
 * The file is JSON, written with owner-only permissions. A session handed
 * out by {@link ClientStateStore.takeSession} is removed from the file until
 * it is released, so at most one holder uses it at a time.
 *
 * @module
 */

import { chmod, mkdir, readFile, writeFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import { formatZodIssues } from '@nexus-core/sdk';
import { ClientStateError, ValidationError } from '../types/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';

export const CLIENT_STATE_FILE = 'client-state.json';
const STATE_FILE_MODE = 0o600;
const SESSION_ID_RE = /^[0-9a-f]{64}$/;

export interface ClientState {
  /** Long-term identity key, encoded by whoever created it */
  identityKey?: string;
  /** Opaque session states by session id */
  sessions: Record<string, unknown>;
}

export interface TakenSession {
  id: string;
  state: unknown;
}

const clientStateSchema = z
  .object({
    identity_key: z.string().optional(),
    sessions: z.record(z.string().regex(SESSION_ID_RE, 'session ids must be 64 lowercase hex chars'), z.unknown()).default({}),
  })
  .transform((file): ClientState => {
    const state: ClientState = { sessions: file.sessions };
    if (file.identity_key !== undefined) state.identityKey = file.identity_key;
    return state;
  });

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/** `$NEXUS_CONFIG_DIR`, or `~/.nexus`. */
export function nexusConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.NEXUS_CONFIG_DIR;
  return override !== undefined && override !== '' ? override : join(homedir(), '.nexus');
}

export function defaultClientStatePath(env: NodeJS.ProcessEnv = process.env): string {
  return join(nexusConfigDir(env), CLIENT_STATE_FILE);
}

export function normalizeSessionId(id: string): string {
  const lowered = id.toLowerCase();
  if (!SESSION_ID_RE.test(lowered)) {
    throw new ValidationError(`Session id must be 32 bytes of hex, got "${id}"`);
  }
  return lowered;
}

export interface ClientStateStoreConfig {
  /** Defaults to {@link defaultClientStatePath} */
  path?: string;
  logger?: Logger;
}

export class ClientStateStore {
  readonly path: string;
  private readonly logger: Logger;
  /** Serializes read-modify-write cycles within this process. */
  private tail: Promise<unknown> = Promise.resolve();

  constructor(config: ClientStateStoreConfig = {}) {
    this.path = config.path ?? defaultClientStatePath();
    this.logger = config.logger ?? silentLogger;
  }

  /** Current state; a missing file reads as empty. */
  async load(): Promise<ClientState> {
    let text: string;
    try {
      text = await readFile(this.path, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) return { sessions: {} };
      throw new ClientStateError(`Failed to read client state: ${String(error)}`, this.path);
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw new ClientStateError(`Client state is not valid JSON: ${String(error)}`, this.path);
    }
    const parsed = clientStateSchema.safeParse(json);
    if (!parsed.success) {
      throw new ClientStateError(`Invalid client state: ${formatZodIssues(parsed.error).join('; ')}`, this.path);
    }
    return parsed.data;
  }

  async save(state: ClientState): Promise<void> {
    const file: Record<string, unknown> = {};
    if (state.identityKey !== undefined) file.identity_key = state.identityKey;
    file.sessions = state.sessions;

    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(this.path, `${JSON.stringify(file, null, 2)}\n`, { mode: STATE_FILE_MODE });
    // The mode above only applies when the file is created.
    await chmod(this.path, STATE_FILE_MODE);
  }

  async getIdentityKey(): Promise<string> {
    const state = await this.load();
    if (state.identityKey === undefined) {
      throw new ClientStateError('No identity key found', this.path);
    }
    return state.identityKey;
  }

  async setIdentityKey(identityKey: string): Promise<void> {
    await this.update((state) => {
      state.identityKey = identityKey;
    });
  }

  /**
   * Remove a session from the file and hand it to the caller. Without an
   * id, the first stored session is taken.
   */
  async takeSession(id?: string): Promise<TakenSession> {
    return this.update((state) => {
      const wanted = id === undefined ? Object.keys(state.sessions)[0] : normalizeSessionId(id);
      if (wanted === undefined) {
        throw new ClientStateError('No active sessions found', this.path);
      }
      if (!(wanted in state.sessions)) {
        throw new ClientStateError(`Session ${wanted} not found`, this.path);
      }
      const taken = { id: wanted, state: state.sessions[wanted] };
      delete state.sessions[wanted];
      this.logger.debug(`Took session ${wanted}`);
      return taken;
    });
  }

  /** Store a session, typically one returned by {@link takeSession} after use. */
  async releaseSession(id: string, sessionState: unknown): Promise<void> {
    const key = normalizeSessionId(id);
    await this.update((state) => {
      state.sessions[key] = sessionState;
    });
    this.logger.debug(`Released session ${key}`);
  }

  /** Remove the identity key and every session. */
  async truncate(): Promise<void> {
    await this.enqueue(() => this.save({ sessions: {} }));
  }

  private async update<T>(mutate: (state: ClientState) => T): Promise<T> {
    return this.enqueue(async () => {
      const state = await this.load();
      const result = mutate(state);
      await this.save(state);
      return result;
    });
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task, task);
    // Failures reach the caller through `run`; the queue moves on.
    this.tail = run.catch(() => undefined);
    return run;
  }
}
