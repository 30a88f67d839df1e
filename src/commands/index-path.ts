import { Args, Command, Flags } from "@oclif/core";
import { createConfirm, createServiceRuntime, failAndExit, ingestFlags } from "../lib/command-utils.js";
import { Output } from "../lib/output.js";

export default class Index extends Command {
  static description = "Create a remote index for a directory or glob and upload its supported files";

  static examples = [
    "<%= config.bin %> index ~/notes",
    '<%= config.bin %> index "~/notes/**/*.org"',
    "<%= config.bin %> index ./docs --force",
    "<%= config.bin %> index ./docs --yes",
  ];

  static args = {
    reference: Args.string({
      description: "Directory, glob pattern, 'auto' or an index id",
      required: true,
    }),
  };

  static flags = {
    ...ingestFlags,
    force: Flags.boolean({
      char: "f",
      description: "Build a new index even if this path was indexed before",
      default: false,
    }),
  };

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Index);
    const out = new Output({ verbose: flags.verbose });

    try {
      const { store, resolver } = await createServiceRuntime(out, flags);
      const outcome = await resolver.index(args.reference, {
        confirm: createConfirm(out, flags.yes),
        force: flags.force,
      });

      switch (outcome.status) {
        case "existing":
          out.success(`Already indexed as ${outcome.indexId}`);
          out.detail("Use --force to build a new index, or 'extend' to add files.");
          return;
        case "cancelled":
          out.warn("Aborted; nothing was uploaded.");
          return;
        case "created": {
          const { result } = outcome;
          await store.save();
          out.summary("Indexing finished");
          if (result.failed.length > 0) {
            out.warn(`${result.failed.length} file(s) failed; re-run 'extend' to retry them:`);
            for (const failure of result.failed) {
              out.item(`${failure.path} (${failure.kind}: ${failure.reason})`);
            }
          }
          console.log();
          console.log("=== INDEX (cached) ===");
          console.log(`Key: ${outcome.key}`);
          console.log(`ID : ${outcome.indexId}`);
          console.log(`Saved to: ${store.location}`);
          return;
        }
      }
    } catch (error) {
      failAndExit(out, error);
    }
  }
}
