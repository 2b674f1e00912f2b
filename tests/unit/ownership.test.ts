import { beforeEach, describe, expect, it } from "vitest";
import { assertArtifactKind, loadOwnedArtifacts } from "../../src/artifacts/ownership";
import { InMemoryArtifactStore, OWNER_A, OWNER_B } from "../helpers/fakes";

const A1 = "11111111-1111-4111-8111-111111111111";
const A2 = "22222222-2222-4222-8222-222222222222";
const B1 = "33333333-3333-4333-8333-333333333333";
const MISSING = "44444444-4444-4444-8444-444444444444";

describe("loadOwnedArtifacts", () => {
  let store: InMemoryArtifactStore;

  beforeEach(() => {
    store = new InMemoryArtifactStore();
    store.seed({ id: A1, ownerId: OWNER_A, kind: "pdf", filename: "a1.pdf", storagePath: "p/a1" });
    store.seed({ id: A2, ownerId: OWNER_A, kind: "pdf", filename: "a2.pdf", storagePath: "p/a2" });
    store.seed({ id: B1, ownerId: OWNER_B, kind: "pdf", filename: "b1.pdf", storagePath: "p/b1" });
  });

  it("returns artifacts in the requested order", async () => {
    const loaded = await loadOwnedArtifacts(store, OWNER_A, [A2, A1]);
    expect(loaded.map((a) => a.id)).toEqual([A2, A1]);
  });

  it("rejects another owner's artifact as forbidden", async () => {
    await expect(loadOwnedArtifacts(store, OWNER_A, [A1, B1])).rejects.toMatchObject({
      code: "FORBIDDEN",
      message: `Not authorized to use artifact ${B1}`,
    });
  });

  it("reports missing ids before ownership", async () => {
    await expect(loadOwnedArtifacts(store, OWNER_A, [B1, MISSING])).rejects.toMatchObject({
      code: "NOT_FOUND",
      message: `Artifact ${MISSING} not found`,
    });
  });

  it("treats malformed ids as missing", async () => {
    await expect(loadOwnedArtifacts(store, OWNER_A, ["not-a-uuid"])).rejects.toMatchObject({
      code: "NOT_FOUND",
    });
  });
});

describe("assertArtifactKind", () => {
  it("rejects the wrong kind", async () => {
    const store = new InMemoryArtifactStore();
    const image = store.seed({ id: A1, ownerId: OWNER_A, kind: "image-upload", filename: "x.png", storagePath: "p" });

    expect(() => assertArtifactKind(image, "pdf")).toThrow(`Artifact ${A1} has kind image-upload, expected pdf`);
  });
});
