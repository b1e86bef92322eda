/**
 * The CLI runs from source: workspace packages export TypeScript, so no
 * compiled entry point is advertised.
 */

import { describe, it, expect } from "vitest";
import { readFile } from "node:fs/promises";

async function manifest(relative: string): Promise<Record<string, unknown>> {
  return JSON.parse(await readFile(new URL(relative, import.meta.url), "utf8"));
}

describe("package manifests", () => {
  it("declares no bin pointing at build output", async () => {
    const root = await manifest("../../../package.json");
    expect(root["bin"]).toBeUndefined();
    expect(root["scripts"]).toMatchObject({ cli: "tsx apps/cli/src/index.ts" });
  });

  it("runs the CLI through the protocol package's TypeScript sources", async () => {
    const protocol = await manifest("../../../packages/protocol/package.json");
    expect(protocol["exports"]).toEqual({ ".": "./src/index.ts" });
  });
});
