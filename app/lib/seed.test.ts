import { describe, expect, it } from "vitest";
import { MemoryCatalogStore } from "./db/memoryStore";
import { seedCatalog } from "./seed";

describe("seedCatalog", () => {
  it("inserts sample projects and content", async () => {
    const store = new MemoryCatalogStore();
    const result = await seedCatalog(store);

    expect(result).toEqual({
      projects: { created: 3, skipped: 0 },
      content: { created: 2, skipped: 0 },
    });
    const stats = await store.stats();
    expect(stats.total_projects).toBe(3);
    expect(stats.total_content).toBe(2);
  });

  it("skips records that already exist", async () => {
    const store = new MemoryCatalogStore();
    await seedCatalog(store);
    const again = await seedCatalog(store);

    expect(again).toEqual({
      projects: { created: 0, skipped: 3 },
      content: { created: 0, skipped: 2 },
    });
    expect((await store.stats()).total_projects).toBe(3);
  });
});
