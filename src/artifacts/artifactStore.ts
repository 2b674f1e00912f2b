import type { Pool } from "pg";
import { ARTIFACT_KINDS, Artifact, ArtifactKind, NewArtifact, Page } from "./types";

export interface ArtifactStore {
  /** Insert-once keyed by storage path; returns the existing row if the path is taken. */
  create(artifact: NewArtifact): Promise<Artifact>;
  get(artifactId: string): Promise<Artifact | null>;
  getMany(artifactIds: string[]): Promise<Artifact[]>;
  findByStoragePath(storagePath: string): Promise<Artifact | null>;
  listByOwner(ownerId: string, page: Page): Promise<Artifact[]>;
}

interface ArtifactRow {
  id: string;
  owner_id: string;
  kind: string;
  filename: string;
  storage_path: string;
  content_type: string;
  size_bytes: string | number;
  source_task_id: string | null;
  created_at: Date;
}

const ARTIFACT_COLUMNS = `
  id, owner_id, kind, filename, storage_path, content_type, size_bytes, source_task_id, created_at
`;

function toKind(value: string): ArtifactKind {
  const kind = ARTIFACT_KINDS.find((k) => k === value);
  if (!kind) {
    throw new Error(`Unknown artifact kind in database: ${value}`);
  }
  return kind;
}

function rowToArtifact(row: ArtifactRow): Artifact {
  return {
    id: row.id,
    ownerId: row.owner_id,
    kind: toKind(row.kind),
    filename: row.filename,
    storagePath: row.storage_path,
    contentType: row.content_type,
    sizeBytes: Number(row.size_bytes),
    sourceTaskId: row.source_task_id,
    createdAt: row.created_at,
  };
}

export class PgArtifactStore implements ArtifactStore {
  constructor(private readonly pool: Pool) { }

  async create(artifact: NewArtifact): Promise<Artifact> {
    const { rows } = await this.pool.query<ArtifactRow>(
      `
      INSERT INTO artifacts (
        id, owner_id, kind, filename, storage_path, content_type, size_bytes, source_task_id, created_at
      )
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, NOW())
      ON CONFLICT (storage_path) DO NOTHING
      RETURNING ${ARTIFACT_COLUMNS}
      `,
      [
        artifact.id,
        artifact.ownerId,
        artifact.kind,
        artifact.filename,
        artifact.storagePath,
        artifact.contentType,
        artifact.sizeBytes,
        artifact.sourceTaskId,
      ]
    );

    if (rows.length) {
      console.log(`[ARTIFACT] created ${artifact.kind} ${rows[0].id} at ${artifact.storagePath}`);
      return rowToArtifact(rows[0]);
    }

    const existing = await this.findByStoragePath(artifact.storagePath);
    if (!existing) {
      throw new Error(`Artifact at ${artifact.storagePath} conflicted but could not be read back`);
    }
    return existing;
  }

  async get(artifactId: string): Promise<Artifact | null> {
    const { rows } = await this.pool.query<ArtifactRow>(
      `SELECT ${ARTIFACT_COLUMNS} FROM artifacts WHERE id = $1`,
      [artifactId]
    );
    return rows.length ? rowToArtifact(rows[0]) : null;
  }

  async getMany(artifactIds: string[]): Promise<Artifact[]> {
    if (artifactIds.length === 0) return [];
    const { rows } = await this.pool.query<ArtifactRow>(
      `SELECT ${ARTIFACT_COLUMNS} FROM artifacts WHERE id = ANY($1::uuid[])`,
      [artifactIds]
    );
    return rows.map(rowToArtifact);
  }

  async findByStoragePath(storagePath: string): Promise<Artifact | null> {
    const { rows } = await this.pool.query<ArtifactRow>(
      `SELECT ${ARTIFACT_COLUMNS} FROM artifacts WHERE storage_path = $1`,
      [storagePath]
    );
    return rows.length ? rowToArtifact(rows[0]) : null;
  }

  async listByOwner(ownerId: string, page: Page): Promise<Artifact[]> {
    const { rows } = await this.pool.query<ArtifactRow>(
      `
      SELECT ${ARTIFACT_COLUMNS}
      FROM artifacts
      WHERE owner_id = $1
      ORDER BY created_at DESC
      LIMIT $2 OFFSET $3
      `,
      [ownerId, page.limit, page.offset]
    );
    return rows.map(rowToArtifact);
  }
}
