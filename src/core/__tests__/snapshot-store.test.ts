import * as fs from "fs";
import * as path from "path";
import { describe, it, expect } from "vitest";
import { SnapshotStore } from "../snapshot-store";
import { buildSearchUrl, identifierFromUrl } from "../urls";
import { tempDir } from "../../__tests__/fakes";

describe("SnapshotStore", () => {
  it("names search pages after the query and detail pages after the identifier", () => {
    const store = new SnapshotStore("/snaps");

    expect(store.pathFor(buildSearchUrl("https://www.example.com", "desk lamp"))).toBe(
      path.join("/snaps", "search_desk_lamp.html")
    );
    expect(store.pathFor("https://www.example.com/Lamp/dp/B0LAMP0001/ref=sr_1_1")).toBe(
      path.join("/snaps", "product_B0LAMP0001.html")
    );
    expect(store.pathFor("https://www.example.com/gp/help")).toBeNull();
  });

  it("returns null for a missing file instead of throwing", () => {
    const store = new SnapshotStore(tempDir());

    expect(store.load("https://www.example.com/dp/B0LAMP0009")).toBeNull();
    expect(store.has("https://www.example.com/dp/B0LAMP0009")).toBe(false);
    expect(store.load("https://www.example.com/unknown")).toBeNull();
  });

  it("saves into a directory it creates and loads the same content back", () => {
    const dir = path.join(tempDir(), "a", "b");
    const store = new SnapshotStore(dir);
    const url = "https://www.example.com/dp/B0LAMP0002";

    const file = store.save(url, "<html>two</html>");
    store.save(url, "<html>two again</html>");

    expect(file).toBe(path.join(dir, "product_B0LAMP0002.html"));
    expect(store.has(url)).toBe(true);
    expect(store.load(url)).toBe("<html>two again</html>");
    expect(fs.readdirSync(dir)).toEqual(["product_B0LAMP0002.html"]);
  });
});

describe("identifierFromUrl", () => {
  it("reads the ten-character code after /dp/", () => {
    expect(identifierFromUrl("https://www.example.com/Some-Name/dp/B07XJ8C8F5?th=1")).toBe(
      "B07XJ8C8F5"
    );
    expect(identifierFromUrl("https://www.example.com/dp/b07xj8c8f5")).toBeNull();
    expect(identifierFromUrl("https://www.example.com/gp/product")).toBeNull();
  });
});
