import { validate as isUuid } from "uuid";
import { forbidden, invalidRequest, notFound } from "../errors";
import type { ArtifactStore } from "./artifactStore";
import type { Artifact, ArtifactKind } from "./types";

/**
 * Resolve `artifactIds` for `ownerId`, in the order given.
 * Missing ids fail with NOT_FOUND before any ownership check; foreign ones
 * with FORBIDDEN.
 */
export async function loadOwnedArtifacts(
  store: ArtifactStore,
  ownerId: string,
  artifactIds: string[]
): Promise<Artifact[]> {
  const lookup = artifactIds.filter((id) => isUuid(id));
  const found = new Map((await store.getMany(lookup)).map((a) => [a.id, a]));

  const ordered = artifactIds.map((id) => {
    const artifact = found.get(id);
    if (!artifact) throw notFound(`Artifact ${id} not found`);
    return artifact;
  });

  const foreign = ordered.find((a) => a.ownerId !== ownerId);
  if (foreign) {
    console.warn(`[OWNERSHIP] user ${ownerId} referenced artifact ${foreign.id} owned by another user`);
    throw forbidden(`Not authorized to use artifact ${foreign.id}`);
  }

  return ordered;
}

export async function loadOwnedArtifact(store: ArtifactStore, ownerId: string, artifactId: string) {
  const [artifact] = await loadOwnedArtifacts(store, ownerId, [artifactId]);
  return artifact;
}

export function assertArtifactKind(artifact: Artifact, expected: ArtifactKind) {
  if (artifact.kind !== expected) {
    throw invalidRequest(`Artifact ${artifact.id} has kind ${artifact.kind}, expected ${expected}`);
  }
}
