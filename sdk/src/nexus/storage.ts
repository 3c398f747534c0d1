/**
 * Committing port data before it goes on the ledger.
 *
 * Inline data stays in the transaction; remote data is uploaded to an
 * {@link ArtifactStorage} and replaced by its key. Arrays are stored as one
 * blob and referenced by the same key repeated once per element, so the
 * element count survives. Encrypted values pass through a
 * {@link SessionCipher} first.
 *
 * @module
 */

import { StorageError } from "../errors.js";
import type { JsonValue, NexusData } from "../types/nexus-data.js";

/** Longest retention a remote store accepts, in storage epochs. */
export const MAX_SAVE_FOR_EPOCHS = 53;

/** Content-addressed blob store for port data too large to inline. */
export interface ArtifactStorage {
  /** Store `json` and return the key it can be fetched by. */
  commit(json: JsonValue, saveForEpochs: number): Promise<string>;
  fetch(key: string): Promise<JsonValue>;
}

export interface StorageConf {
  /** Required once any port uses remote storage */
  remote?: ArtifactStorage;
  saveForEpochs?: number;
}

/** Encrypts and decrypts port values for one session with the leaders. */
export interface SessionCipher {
  encrypt(json: JsonValue): JsonValue | Promise<JsonValue>;
  decrypt(json: JsonValue): JsonValue | Promise<JsonValue>;
}

function requireCipher(cipher: SessionCipher | undefined): SessionCipher {
  if (cipher === undefined) {
    throw new StorageError("Encrypted port data needs an active session");
  }
  return cipher;
}

function requireRemote(conf: StorageConf): { remote: ArtifactStorage; saveForEpochs: number } {
  if (conf.remote === undefined) {
    throw new StorageError("Remote storage is not configured");
  }
  if (conf.saveForEpochs === undefined) {
    throw new StorageError("Remote storage retention (save for epochs) is not configured");
  }
  if (conf.saveForEpochs > MAX_SAVE_FOR_EPOCHS) {
    throw new StorageError(`Save for epochs exceeds maximum allowed (${MAX_SAVE_FOR_EPOCHS})`);
  }
  return { remote: conf.remote, saveForEpochs: conf.saveForEpochs };
}

/** Encrypt if needed and, for remote data, upload and return the key(s). */
export async function commitNexusData(
  value: NexusData,
  conf: StorageConf,
  cipher?: SessionCipher,
): Promise<NexusData> {
  if (value.storage === "walrus" && Array.isArray(value.data) && value.data.length === 0) {
    return { ...value, data: [] };
  }

  const data = value.encrypted ? await requireCipher(cipher).encrypt(value.data) : value.data;
  if (value.storage === "inline") {
    return { ...value, data };
  }

  const { remote, saveForEpochs } = requireRemote(conf);
  let key: string;
  try {
    key = await remote.commit(data, saveForEpochs);
  } catch (error) {
    throw new StorageError("Failed to store port data remotely", error);
  }
  const keys: JsonValue = Array.isArray(data) ? data.map(() => key) : key;
  return { ...value, data: keys };
}

/** Inverse of {@link commitNexusData}: resolve remote keys and decrypt. */
export async function fetchNexusData(value: NexusData, conf: StorageConf, cipher?: SessionCipher): Promise<NexusData> {
  let data = value.data;
  if (value.storage === "walrus") {
    if (Array.isArray(data) && data.length === 0) return { ...value, data: [] };
    const key = Array.isArray(data) ? data[0] : data;
    if (typeof key !== "string") {
      throw new StorageError("Remote data must be referenced by a string key or an array of string keys");
    }
    if (conf.remote === undefined) {
      throw new StorageError("Remote storage is not configured");
    }
    try {
      data = await conf.remote.fetch(key);
    } catch (error) {
      throw new StorageError(`Failed to fetch remote port data ${key}`, error);
    }
  }
  if (value.encrypted) {
    data = await requireCipher(cipher).decrypt(data);
  }
  return { ...value, data };
}

/** Commit every port of every vertex, keeping map order. */
export async function commitEntryData(
  inputs: ReadonlyMap<string, ReadonlyMap<string, NexusData>>,
  conf: StorageConf,
  cipher?: SessionCipher,
): Promise<Map<string, Map<string, NexusData>>> {
  const committed = new Map<string, Map<string, NexusData>>();
  for (const [vertex, ports] of inputs) {
    const out = new Map<string, NexusData>();
    for (const [port, value] of ports) {
      out.set(port, await commitNexusData(value, conf, cipher));
    }
    committed.set(vertex, out);
  }
  return committed;
}
