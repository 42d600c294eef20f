import { mkdir, readFile, readdir, rename, unlink, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { SessionRecord } from "./types.js";
import type { SessionStorePort } from "./ports.js";
import { PrivacyError } from "./errors.js";
import { parseSessionRecord } from "./schemas.js";

const FILE_NAME = /^session_([A-Za-z0-9_-]{1,128})\.json$/;

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * One JSON document per session: `<directory>/session_<id>.json`.
 * Writes go to a temp file first and are renamed into place, so a reader
 * never sees a half-written record.
 */
export class JsonFileSessionStore implements SessionStorePort {
  private sequence = 0;

  constructor(readonly directory: string) {}

  pathFor(sessionId: string): string {
    return join(this.directory, `session_${sessionId}.json`);
  }

  async load(sessionId: string): Promise<SessionRecord | null> {
    let raw: string;
    try {
      raw = await readFile(this.pathFor(sessionId), "utf-8");
    } catch (err) {
      if (isMissing(err)) return null;
      throw err;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new PrivacyError(`Session file for ${sessionId} is not valid JSON`, { sessionId }, { cause: err });
    }
    const parsed = parseSessionRecord(json);
    if (!parsed.ok) {
      throw new PrivacyError(`Session file for ${sessionId} is malformed: ${parsed.reason}`, { sessionId });
    }
    return parsed.record;
  }

  async save(record: SessionRecord): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    const target = this.pathFor(record.session_id);
    const tmp = `${target}.${process.pid}.${++this.sequence}.tmp`;
    await writeFile(tmp, JSON.stringify(record, null, 2), "utf-8");
    try {
      await rename(tmp, target);
    } catch (err) {
      await unlink(tmp).catch(() => undefined);
      throw err;
    }
  }

  async delete(sessionId: string): Promise<boolean> {
    try {
      await unlink(this.pathFor(sessionId));
      return true;
    } catch (err) {
      if (isMissing(err)) return false;
      throw err;
    }
  }

  async list(): Promise<string[]> {
    let names: string[];
    try {
      names = await readdir(this.directory);
    } catch (err) {
      if (isMissing(err)) return [];
      throw err;
    }
    const ids: string[] = [];
    for (const name of names.sort()) {
      const m = FILE_NAME.exec(name);
      if (m) ids.push(m[1]);
    }
    return ids;
  }
}
