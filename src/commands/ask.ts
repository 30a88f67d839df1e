import { Args, Command } from "@oclif/core";
import { answerFlags, createServiceRuntime, failAndExit, resolveIndexIds } from "../lib/command-utils.js";
import { askOnce } from "../lib/conversation.js";
import { Output } from "../lib/output.js";

export default class Ask extends Command {
  static description = "Ask a single question against an index";

  static examples = [
    '<%= config.bin %> ask auto "What did I write about backups?"',
    '<%= config.bin %> ask ~/notes "Summarise the meeting notes from March"',
    '<%= config.bin %> ask vs_abc123 "Which invoices are overdue?" --model gpt-4.1',
    '<%= config.bin %> ask ~/notes "Compare both plans" --also ~/work/plans',
  ];

  // The question may be given unquoted as several words
  static strict = false;

  static args = {
    reference: Args.string({
      description: "Directory, glob pattern, 'auto' or an index id",
      required: true,
    }),
    question: Args.string({
      description: "Question to ask",
      required: true,
    }),
  };

  static flags = {
    ...answerFlags,
  };

  async run(): Promise<void> {
    const { args, argv, flags } = await this.parse(Ask);
    const out = new Output({ verbose: flags.verbose });

    const question = argv.slice(1).map(String).join(" ").trim() || args.question;

    try {
      const { config, resolver, service } = await createServiceRuntime(out, flags);
      const indexIds = await resolveIndexIds(resolver, [args.reference, ...(flags.also ?? [])]);
      out.info(`Searching ${indexIds.join(", ")}`);

      const answer = await askOnce(
        { service, model: flags.model ?? config.model, maxResults: config.maxResults, indexIds },
        question
      );
      console.log(answer.trim());
    } catch (error) {
      failAndExit(out, error);
    }
  }
}
