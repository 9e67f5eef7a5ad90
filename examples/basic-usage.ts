/**
 * Basic Usage Example
 *
 * Demonstrates path access, queries, merge and diff on a small document.
 * Run with: npx tsx --conditions=source examples/basic-usage.ts
 */

import { Document, fieldOf } from "@docpath/sdk";
import { rm } from "node:fs/promises";
import { join } from "node:path";

async function main() {
  const dataDir = "./examples-data/basic";
  await rm(dataDir, { recursive: true, force: true });

  // CREATE: Build a document from plain data
  console.log("📄 Creating document...");
  const doc = Document.from({
    site: { name: "Field Notes", draft: null },
    posts: [
      { title: "First", views: 10, status: "open" },
      { title: "Second", views: 30, status: "closed" },
      { title: "Third", views: 20, status: "open" },
    ],
  });

  // READ: Dot paths reach into maps and lists
  console.log("\n📖 Reading paths...");
  console.log(`   site.name     = ${JSON.stringify(doc.get("site.name"))}`);
  console.log(`   posts.1.title = ${JSON.stringify(doc.get("posts.1.title"))}`);
  console.log(`   site.owner    = ${JSON.stringify(doc.get("site.owner", "nobody"))}`);

  // WRITE: Missing intermediate maps are created
  console.log("\n✏️  Writing paths...");
  doc.set("site.theme.color", "teal");
  doc.delete("site.draft");
  console.log(`   site = ${JSON.stringify(doc.get("site"))}`);

  // ENUMERATE: Leaf paths, globs and key lookups
  console.log("\n🔍 Enumerating paths...");
  console.log(`   titles: ${doc.findPaths("posts.*.title").join(", ")}`);
  console.log(`   views:  ${doc.findAllKeys("views").join(", ")}`);

  // QUERY: Filter, sort and pluck the posts list
  console.log("\n🔍 Querying open posts by views...");
  const open = doc
    .query("posts")
    .where((item) => fieldOf(item, "status") === "open")
    .sort("views", true)
    .pluck("title");
  console.log(`✅ ${open.join(", ")}`);

  // DIFF: Compare with an edited copy
  console.log("\n🧮 Diffing against an edited copy...");
  const edited = Document.from(doc.toCopy());
  edited.set("posts.0.views", 11);
  edited.set("site.tagline", "notes from the field");
  console.log(`   ${JSON.stringify(edited.diff(doc))}`);

  // SAVE: Atomic write with sorted keys
  const file = join(dataDir, "site.json");
  await edited.save(file, { sortKeys: true });
  const reloaded = await Document.fromFile(file);
  console.log(`\n💾 Saved and reloaded: equal = ${reloaded.equals(edited)}`);

  // STATS
  console.log("\n📊 Stats:");
  console.log(`   ${JSON.stringify(reloaded.stats())}`);

  console.log("\n✅ Example completed successfully!");
  console.log(`📁 Data stored in: ${dataDir}`);
}

main().catch(console.error);
