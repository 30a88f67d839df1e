import { Args, Command } from "@oclif/core";
import { createConfirm, createServiceRuntime, failAndExit, ingestFlags } from "../lib/command-utils.js";
import { Output } from "../lib/output.js";

export default class Extend extends Command {
  static description = "Add new files to the index of a previously indexed directory or glob";

  static examples = [
    '<%= config.bin %> extend ~/notes "~/notes/new/**/*.org"',
    "<%= config.bin %> extend auto ./more-docs",
    "<%= config.bin %> extend vs_abc123 ./report.pdf --yes",
  ];

  static args = {
    reference: Args.string({
      description: "Previously indexed directory or glob, 'auto' or an index id",
      required: true,
    }),
    files: Args.string({
      description: "Directory or glob with the files to add",
      required: true,
    }),
  };

  static flags = {
    ...ingestFlags,
  };

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Extend);
    const out = new Output({ verbose: flags.verbose });

    try {
      const { store, resolver } = await createServiceRuntime(out, flags);
      const outcome = await resolver.extend(args.reference, args.files, {
        confirm: createConfirm(out, flags.yes),
      });

      if (outcome.status === "cancelled") {
        out.warn("Aborted; nothing was uploaded.");
        return;
      }

      await store.save();
      if (outcome.status === "up-to-date") {
        return;
      }
      out.summary(`Extended ${outcome.indexId}`);
      for (const failure of outcome.result.failed) {
        out.item(`${failure.path} (${failure.kind}: ${failure.reason})`);
      }
    } catch (error) {
      failAndExit(out, error);
    }
  }
}
