import { Args, Command } from "@oclif/core";
import chalk from "chalk";
import { createInterface } from "node:readline";
import { answerFlags, createServiceRuntime, failAndExit, resolveIndexIds } from "../lib/command-utils.js";
import { ChatSession, parseChatInput } from "../lib/conversation.js";
import { describeError } from "../lib/errors.js";
import { Output } from "../lib/output.js";

export default class Chat extends Command {
  static description = "Interactive chat against an index (history is kept in memory only)";

  static examples = [
    "<%= config.bin %> chat auto",
    "<%= config.bin %> chat ~/notes",
    "<%= config.bin %> chat vs_abc123 --also ~/work/plans",
  ];

  static args = {
    reference: Args.string({
      description: "Directory, glob pattern, 'auto' or an index id",
      required: true,
    }),
  };

  static flags = {
    ...answerFlags,
  };

  async run(): Promise<void> {
    const { args, flags } = await this.parse(Chat);
    const out = new Output({ verbose: flags.verbose });

    try {
      const { config, resolver, service } = await createServiceRuntime(out, flags);
      const indexIds = await resolveIndexIds(resolver, [args.reference, ...(flags.also ?? [])]);
      const session = new ChatSession({
        service,
        model: flags.model ?? config.model,
        maxResults: config.maxResults,
        indexIds,
      });
      console.log(`Chatting with ${indexIds.join(", ")}`);
      console.log("Type your question. Commands: /exit, /quit, /clear\n");
      await this.repl(session, out);
    } catch (error) {
      failAndExit(out, error);
    }
  }

  private async repl(session: ChatSession, out: Output): Promise<void> {
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    rl.on("SIGINT", () => rl.close());
    rl.setPrompt(chalk.bold("You: "));
    rl.prompt();

    for await (const line of rl) {
      const input = parseChatInput(line);

      if (input.kind === "exit") break;
      if (input.kind === "clear") {
        session.clear();
        out.success("History cleared.");
      } else if (input.kind === "message") {
        try {
          const answer = await session.send(input.text);
          console.log(`\n${chalk.cyan("AI:")} ${answer.trim()}\n`);
        } catch (error) {
          // The turn is dropped; history stays as it was
          out.error(`Request failed: ${describeError(error)}`);
        }
      }
      rl.prompt();
    }

    rl.close();
    console.log("\nLeaving chat.");
  }
}
