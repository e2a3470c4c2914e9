import { describe, it, expect } from "vitest";
import { access, readFile } from "node:fs/promises";
import { z } from "zod";

const ROOT = new URL("../../../", import.meta.url);

const manifestSchema = z.object({
  exports: z.record(z.record(z.string())).optional(),
  bin: z.record(z.string()).optional(),
});

async function readManifest(url: URL) {
  return manifestSchema.parse(JSON.parse(await readFile(url, "utf-8")));
}

describe("package layout", () => {
  it("exports sources for type-checking and built output for node", async () => {
    const manifest = await readManifest(new URL("taskpoints-mcp/package.json", ROOT));

    expect(manifest.exports?.["."]).toEqual({
      source: "./src/lib.ts",
      types: "./dist/lib.d.ts",
      default: "./dist/lib.js",
    });
  });

  it("points every bin at the build of an existing entry", async () => {
    const { bin = {} } = await readManifest(new URL("package.json", ROOT));

    expect(Object.keys(bin).sort()).toEqual(["taskpoints", "taskpoints-mcp"]);
    for (const target of Object.values(bin)) {
      expect(target).toMatch(/^taskpoints-(cli|mcp)\/dist\/index\.js$/);
      const source = target.replace("/dist/", "/src/").replace(/\.js$/, ".ts");
      await expect(access(new URL(source, ROOT))).resolves.toBeUndefined();
    }
  });

  it("finds the quips file from the built flavor module", () => {
    const builtFlavor = new URL("../../dist/notifier/flavor.js", import.meta.url);

    expect(new URL("../../data/quips.json", builtFlavor).href).toBe(
      new URL("../../data/quips.json", import.meta.url).href
    );
  });
});
