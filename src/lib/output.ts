import chalk from "chalk";

export interface OutputOptions {
  verbose: boolean;
}

export class Output {
  private verbose: boolean;
  private startTime: number;
  private uploaded: number = 0;
  private failed: number = 0;

  constructor(options: OutputOptions) {
    this.verbose = options.verbose;
    this.startTime = Date.now();
  }

  // Progress messages (verbose only)
  info(msg: string): void {
    if (this.verbose) {
      console.log(chalk.cyan("●") + " " + chalk.cyan(msg));
    }
  }

  success(msg: string): void {
    console.log(chalk.green("✓") + " " + chalk.green(msg));
  }

  warn(msg: string): void {
    console.log(chalk.yellow("⚠") + " " + chalk.yellow(msg));
  }

  error(msg: string): void {
    console.log(chalk.red("✗") + " " + chalk.red(msg));
  }

  // Section header
  header(title: string): void {
    console.log(chalk.cyan(title));
  }

  // List item (with failure marker)
  item(msg: string): void {
    console.log(chalk.red("  ✗") + " " + msg);
  }

  // Indented secondary line
  detail(msg: string): void {
    console.log(chalk.dim("   " + msg));
  }

  // A file made it into the index
  fileUploaded(path: string, fileId: string): void {
    this.uploaded++;
    if (this.verbose) {
      console.log(chalk.green("  ✓") + " " + chalk.cyan(path) + " " + chalk.dim(`(file_id=${fileId})`));
    } else {
      console.log("  OK: " + path);
    }
  }

  // A file could not be converted or uploaded
  fileFailed(path: string, reason: string): void {
    this.failed++;
    console.log(chalk.red("  ✗") + " " + path + " " + chalk.dim(reason));
  }

  // Final summary of an ingestion batch
  summary(label: string): void {
    const elapsed = ((Date.now() - this.startTime) / 1000).toFixed(1);
    console.log();
    if (this.verbose) {
      console.log(chalk.blue("━━━ Summary ━━━"));
      console.log(chalk.white(`Uploaded: ${this.uploaded}`));
      console.log(chalk.white(`Failed: ${this.failed}`));
      console.log(chalk.white(`Time: ${elapsed}s`));
    } else {
      let summary = `${label}: ${this.uploaded} file(s) uploaded in ${elapsed}s.`;
      if (this.failed > 0) {
        summary += ` ${this.failed} failed.`;
      }
      console.log(summary);
    }
  }
}
