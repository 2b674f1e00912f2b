import type { ArtifactKind } from "./types";

export const PDF_CONTENT_TYPE = "application/pdf";

/** Image types the PDF engine can embed; nothing else is accepted as an upload. */
export const UPLOAD_CONTENT_TYPES = ["image/png", "image/jpeg"] as const;

export type UploadContentType = (typeof UPLOAD_CONTENT_TYPES)[number];

// raw uploads are served as attachments; only generated PDFs open inline
export const ArtifactDefaults: Record<ArtifactKind, { previewable: boolean }> = {
  "image-upload": { previewable: false },
  pdf: { previewable: true },
};

/** Media type without parameters, e.g. `image/png; q=1` → `image/png`. */
export function uploadContentType(contentType: string | undefined): UploadContentType | null {
  const base = contentType?.split(";")[0].trim().toLowerCase();
  return UPLOAD_CONTENT_TYPES.find((allowed) => allowed === base) ?? null;
}
