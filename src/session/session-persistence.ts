import type { Dirent } from 'node:fs';
import { readFile, readdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { writeFileAtomically } from '../config/config-core.ts';
import { errorMessage } from '../core/errors.ts';
import { logWarn } from '../diagnostics/event-log.ts';
import { isCanonicalSessionName } from '../naming/session-name.ts';

export const SESSION_METADATA_VERSION = 1;

const sessionTransportSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('local'),
    program: z.string().min(1)
  }),
  z.object({
    kind: z.literal('remote'),
    host: z.string().min(1),
    port: z.number().int().min(1).max(65535)
  })
]);

export const sessionMetadataSchema = z.object({
  version: z.literal(SESSION_METADATA_VERSION),
  name: z.string().min(1).refine(isCanonicalSessionName, 'name must carry the session prefix'),
  label: z.string().min(1),
  cwd: z.string().min(1),
  createdAt: z.string().min(1),
  transport: sessionTransportSchema
});

export type SessionMetadata = z.infer<typeof sessionMetadataSchema>;

/** What the session manager needs from a metadata store; failures are reported, never fatal. */
export interface SessionMetadataStore {
  save(name: string, metadata: SessionMetadata): Promise<void>;
  loadAll(): Promise<SessionMetadata[]>;
  remove(name: string): Promise<void>;
}

const METADATA_FILE_SUFFIX = '.json';

export class FileSessionMetadataStore implements SessionMetadataStore {
  constructor(private readonly directory: string) {}

  filePathFor(name: string): string {
    return join(this.directory, `${name}${METADATA_FILE_SUFFIX}`);
  }

  async save(name: string, metadata: SessionMetadata): Promise<void> {
    const validated = sessionMetadataSchema.parse(metadata);
    writeFileAtomically(this.filePathFor(name), `${JSON.stringify(validated, null, 2)}\n`);
  }

  async loadAll(): Promise<SessionMetadata[]> {
    let dirents: Dirent[];
    try {
      dirents = await readdir(this.directory, { withFileTypes: true });
    } catch (error: unknown) {
      if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }
    const entries = dirents
      .filter((entry) => entry.isFile() && entry.name.endsWith(METADATA_FILE_SUFFIX))
      .map((entry) => entry.name)
      .sort();
    const loaded: SessionMetadata[] = [];
    for (const fileName of entries) {
      const filePath = join(this.directory, fileName);
      try {
        const parsed: unknown = JSON.parse(await readFile(filePath, 'utf8'));
        const result = sessionMetadataSchema.safeParse(parsed);
        if (!result.success) {
          logWarn('session.metadata.invalid', {
            file: filePath,
            issues: result.error.issues.map((issue) => issue.path.join('.')).join(',')
          });
          continue;
        }
        loaded.push(result.data);
      } catch (error: unknown) {
        logWarn('session.metadata.unreadable', { file: filePath, message: errorMessage(error) });
      }
    }
    return loaded;
  }

  async remove(name: string): Promise<void> {
    await rm(this.filePathFor(name), { force: true });
  }
}

export class InMemorySessionMetadataStore implements SessionMetadataStore {
  private readonly records = new Map<string, SessionMetadata>();

  async save(name: string, metadata: SessionMetadata): Promise<void> {
    this.records.set(name, sessionMetadataSchema.parse(metadata));
  }

  async loadAll(): Promise<SessionMetadata[]> {
    return [...this.records.values()].sort((left, right) => left.name.localeCompare(right.name));
  }

  async remove(name: string): Promise<void> {
    this.records.delete(name);
  }
}
