/**
 * Basic Search Example
 *
 * Indexes a directory, runs a few queries and saves a snapshot.
 * Usage: basic-search.ts [dir] (defaults to the current directory)
 */

import { openFileIndex } from "@driveindex/sdk";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

async function main(): Promise<void> {
  const root = process.argv[2] ?? process.cwd();
  const index = openFileIndex({ drives: [{ id: "example", root }] });

  index.on("index-building", (event) => {
    console.log(`[${event.drive}] ${event.status}${event.count !== undefined ? ` (${event.count} entries)` : ""}`);
  });

  console.log(`Indexing ${root}...`);
  const summary = await index.buildIndex();
  if (summary.failedDrives.length > 0) {
    console.error(`Build failed: ${summary.failedDrives.map((f) => f.reason).join(", ")}`);
    await index.close();
    process.exitCode = 1;
    return;
  }

  for (const raw of ["readme", "ext:ts|json", "*.md !changelog", "size:>100kb file:"]) {
    console.log(`\nQuery: ${raw}`);
    for await (const event of index.compileAndSearch(raw, "all", { maxResults: 5 })) {
      if (event.type === "batch") {
        for (const result of event.results) {
          console.log(`  ${result.fullPath} (${result.size} bytes)`);
        }
      } else {
        console.log(`  ${event.total} result(s)${event.truncated ? ", more available" : ""}`);
      }
    }
  }

  // Snapshots let a later process search without walking again
  const snapshotDir = await mkdtemp(join(tmpdir(), "driveindex-example-"));
  const files = await index.saveSnapshots(snapshotDir);
  console.log(`\nSaved ${files.length} snapshot(s) to ${snapshotDir}`);

  await index.close();
  await rm(snapshotDir, { recursive: true, force: true });
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
