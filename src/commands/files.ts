import { Args, Command } from "@oclif/core";
import { commonFlags, createRuntime, failAndExit } from "../lib/command-utils.js";
import { Output } from "../lib/output.js";

export default class Files extends Command {
  static description = "Show the files recorded as ingested for an index (no network access)";

  static examples = ["<%= config.bin %> files auto", "<%= config.bin %> files ~/notes"];

  static args = {
    reference: Args.string({
      description: "Directory, glob pattern, 'auto' or an index id",
      required: true,
    }),
  };

  static flags = {
    ...commonFlags,
  };

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Files);
    const out = new Output({ verbose: flags.verbose });

    try {
      const { resolver } = await createRuntime(out, flags, { withService: false });
      const { indexId, files } = await resolver.files(args.reference);

      out.header(`${indexId} (${files.length} file(s))`);
      for (const file of files) {
        console.log(file);
      }
    } catch (error) {
      failAndExit(out, error);
    }
  }
}
