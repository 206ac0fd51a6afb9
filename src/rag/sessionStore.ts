import path from 'node:path';
import fs from 'node:fs/promises';
import { v4 as uuidv4 } from 'uuid';
import { SessionNotFoundError, StorageError, hasErrorCode } from './errors';
import type { Session } from './types';
import { createLogger } from '../core/logger';

const log = createLogger('SessionStore');

const UPLOADS_DIR = 'uploads';
const INDEX_DIR = 'index';
const SESSION_ID_PATTERN = /^session_(\d{4})(\d{2})(\d{2})_(\d{2})(\d{2})(\d{2})_([0-9a-f]{8})$/;
const MAX_ID_ATTEMPTS = 5;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Build a session id of the form session_<YYYYMMDD>_<HHMMSS>_<suffix> (UTC).
 */
export function createSessionId(date: Date, suffix: string): string {
  const day = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
  return `session_${day}_${time}_${suffix}`;
}

/**
 * Recover the creation time from a session id, or null when the id is not
 * one this store could have issued.
 */
export function parseSessionId(sessionId: string): { createdAt: Date } | null {
  const match = SESSION_ID_PATTERN.exec(sessionId);
  if (!match) return null;
  const [, year, month, day, hours, minutes, seconds] = match.map(Number);
  const createdAt = new Date(
    Date.UTC(year, month - 1, day, hours, minutes, seconds)
  );
  // Reject ids like 20241345 that Date.UTC would silently roll over
  if (createdAt.getUTCMonth() !== month - 1 || createdAt.getUTCDate() !== day) {
    return null;
  }
  return { createdAt };
}

function randomSuffix(): string {
  return uuidv4().replace(/-/g, '').slice(0, 8);
}

export interface SessionStoreOptions {
  /** Directory holding one subdirectory per session */
  root: string;
  now?: () => Date;
  suffix?: () => string;
}

export class SessionStore {
  readonly root: string;
  private now: () => Date;
  private suffix: () => string;

  constructor(options: SessionStoreOptions) {
    this.root = path.resolve(options.root);
    this.now = options.now ?? (() => new Date());
    this.suffix = options.suffix ?? randomSuffix;
  }

  /**
   * Directory layout for an id. Pure: touches nothing on disk.
   */
  pathsFor(sessionId: string): Omit<Session, 'id' | 'createdAt'> {
    const rootDir = path.join(this.root, sessionId);
    return {
      rootDir,
      uploadDir: path.join(rootDir, UPLOADS_DIR),
      indexDir: path.join(rootDir, INDEX_DIR),
    };
  }

  async createSession(): Promise<Session> {
    try {
      await fs.mkdir(this.root, { recursive: true });
    } catch (error) {
      throw new StorageError(this.root, error);
    }

    for (let attempt = 1; attempt <= MAX_ID_ATTEMPTS; attempt++) {
      const createdAt = this.now();
      const id = createSessionId(createdAt, this.suffix());
      const paths = this.pathsFor(id);

      try {
        // Non-recursive so an existing directory means a collision
        await fs.mkdir(paths.rootDir);
      } catch (error) {
        if (hasErrorCode(error, 'EEXIST')) {
          log.warn(`Session id collision on ${id}, retrying`);
          continue;
        }
        throw new StorageError(paths.rootDir, error);
      }

      try {
        await fs.mkdir(paths.uploadDir);
        await fs.mkdir(paths.indexDir);
      } catch (error) {
        await fs.rm(paths.rootDir, { recursive: true, force: true });
        throw new StorageError(paths.rootDir, error);
      }

      // Ids carry second precision; keep createdAt consistent with the id
      const session: Session = {
        id,
        createdAt: new Date(Math.floor(createdAt.getTime() / 1000) * 1000),
        ...paths,
      };
      log.info(`Created session ${id}`);
      return session;
    }

    throw new StorageError(
      this.root,
      new Error(`could not allocate a unique session id after ${MAX_ID_ATTEMPTS} attempts`)
    );
  }

  /**
   * Look up an existing session. Fails with SessionNotFoundError for ids
   * that are malformed or whose index directory does not exist.
   */
  async resolve(sessionId: string): Promise<Session> {
    const parsed = parseSessionId(sessionId);
    if (!parsed) {
      throw new SessionNotFoundError(sessionId);
    }

    const paths = this.pathsFor(sessionId);
    try {
      const stats = await fs.stat(paths.indexDir);
      if (!stats.isDirectory()) {
        throw new SessionNotFoundError(sessionId);
      }
    } catch (error) {
      if (error instanceof SessionNotFoundError) throw error;
      if (hasErrorCode(error, 'ENOENT') || hasErrorCode(error, 'ENOTDIR')) {
        throw new SessionNotFoundError(sessionId);
      }
      throw new StorageError(paths.indexDir, error);
    }

    return { id: sessionId, createdAt: parsed.createdAt, ...paths };
  }

  /**
   * Name an upload will be stored under: the basename of `filename`, with a
   * " (n)" counter before the extension when that name is already in `taken`.
   */
  uploadName(filename: string, taken: ReadonlySet<string>): string {
    const base = path.basename(filename);
    if (!taken.has(base)) return base;

    const { name, ext } = path.parse(base);
    for (let n = 2; ; n++) {
      const candidate = `${name} (${n})${ext}`;
      if (!taken.has(candidate)) return candidate;
    }
  }

  /**
   * Store the raw bytes of an uploaded file in the session's upload area.
   * Returns the stored name (the basename of the supplied filename).
   */
  async saveUpload(
    session: Session,
    filename: string,
    data: Uint8Array
  ): Promise<string> {
    const storedName = path.basename(filename);
    const target = path.join(session.uploadDir, storedName);
    const temp = path.join(session.uploadDir, `.${storedName}.${uuidv4()}.tmp`);

    try {
      await fs.mkdir(session.uploadDir, { recursive: true });
      await fs.writeFile(temp, data);
      await fs.rename(temp, target);
    } catch (error) {
      await fs.rm(temp, { force: true }).catch((cleanupError: unknown) => {
        log.warn(`Could not remove ${temp}`, cleanupError);
      });
      throw new StorageError(target, error);
    }
    return storedName;
  }

  async removeUpload(session: Session, storedName: string): Promise<void> {
    const target = path.join(session.uploadDir, path.basename(storedName));
    try {
      await fs.rm(target, { force: true });
    } catch (error) {
      throw new StorageError(target, error);
    }
  }

  async listUploads(session: Session): Promise<string[]> {
    try {
      const entries = await fs.readdir(session.uploadDir, {
        withFileTypes: true,
      });
      return entries
        .filter((e) => e.isFile() && !e.name.startsWith('.'))
        .map((e) => e.name)
        .sort();
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) return [];
      throw new StorageError(session.uploadDir, error);
    }
  }
}
