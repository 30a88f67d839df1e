import { Command } from "@oclif/core";
import { commonFlags, createRuntime, failAndExit } from "../lib/command-utils.js";
import { Output } from "../lib/output.js";

export default class List extends Command {
  static description = "List cached indexes per directory/glob key (no network access)";

  static examples = ["<%= config.bin %> list", "<%= config.bin %> list --cache-file ./cache.json"];

  static flags = {
    ...commonFlags,
  };

  async run(): Promise<void> {
    const { flags } = await this.parse(List);
    const out = new Output({ verbose: flags.verbose });

    try {
      const { store, resolver } = await createRuntime(out, flags, { withService: false });
      const entries = resolver.list();

      if (entries.length === 0) {
        console.log("No cached indexes.");
        return;
      }

      console.log(`Cache file: ${store.location}\n`);
      console.log("Cached indexes (per directory/glob key):");
      for (const entry of entries) {
        const marker = entry.lastUsed ? "  (last used)" : "";
        console.log(`- ${entry.key} -> ${entry.indexId} [${entry.fileCount} file(s)]${marker}`);
      }

      // Migrated legacy caches are written back in the current layout
      await store.save();
    } catch (error) {
      failAndExit(out, error);
    }
  }
}
