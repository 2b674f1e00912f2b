export const ARTIFACT_KINDS = ["image-upload", "pdf"] as const;

export type ArtifactKind = (typeof ARTIFACT_KINDS)[number];

export interface Artifact {
  id: string;
  ownerId: string;
  kind: ArtifactKind;
  filename: string;
  storagePath: string;
  contentType: string;
  sizeBytes: number;
  sourceTaskId: string | null;
  createdAt: Date;
}

export type NewArtifact = Omit<Artifact, "createdAt">;

export interface Page {
  limit: number;
  offset: number;
}
