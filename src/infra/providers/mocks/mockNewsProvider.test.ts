import { describe, expect, it } from "vitest";
import { MockNewsProvider } from "./mockNewsProvider";

describe("MockNewsProvider", () => {
  it("returns at most five hourly headlines ending at the window end", async () => {
    const to = new Date("2026-03-02T12:00:00.000Z");
    const items = (
      await new MockNewsProvider().fetchArticles({
        symbol: "acme",
        from: new Date("2026-02-23T12:00:00.000Z"),
        to,
        limit: 10,
      })
    )._unsafeUnwrap();

    expect(items).toHaveLength(5);
    expect(items[0]?.title).toBe("ACME mock headline 1");
    expect(items[4]?.publishedAt).toEqual(new Date("2026-03-02T08:00:00.000Z"));
    expect(new Set(items.map((item) => item.id)).size).toBe(5);
  });
});
