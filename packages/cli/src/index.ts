import { Command, Option } from "commander";
import { readFileSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { createStderrLogger, LOG_LEVELS, parseLogLevel, type LogLevel } from "@repohealth/core";
import type { ReportFormat } from "@repohealth/reporter";
import {
  DEFAULT_REMOTE_RETRIES,
  parseRetryCount,
  runScanCommand,
} from "./application/run-scan-command.js";

const program = new Command();
const packageJsonPath = resolve(dirname(fileURLToPath(import.meta.url)), "../package.json");
const { version } = JSON.parse(readFileSync(packageJsonPath, "utf8")) as { version: string };

program
  .name("repohealth")
  .description("Health scores for a directory of local git repositories")
  .version(version);

program
  .command("scan")
  .argument("[root]", "directory holding the repositories to scan (default: current directory)")
  .addOption(
    new Option("--format <format>", "report format: text, md, json, html")
      .choices(["text", "md", "json", "html"])
      .default("text"),
  )
  .option("--json", "shortcut for --format json")
  .option("--output <file>", "write the report to a file instead of stdout")
  .addOption(
    new Option("--github-token <token>", "bearer token for the GitHub API").env("GITHUB_TOKEN"),
  )
  .option("--no-remote", "skip remote repository metadata")
  .option(
    "--remote-retries <count>",
    "retries for rate-limited or failing GitHub API requests",
    parseRetryCount,
    DEFAULT_REMOTE_RETRIES,
  )
  .addOption(
    new Option(
      "--log-level <level>",
      "log verbosity: silent, error, warn, info, debug (logs are written to stderr)",
    )
      .choices(LOG_LEVELS)
      .default(parseLogLevel(process.env["REPOHEALTH_LOG_LEVEL"])),
  )
  .action(
    async (
      root: string | undefined,
      options: {
        format: ReportFormat;
        json?: boolean;
        output?: string;
        githubToken?: string;
        remote: boolean;
        remoteRetries: number;
        logLevel: LogLevel;
      },
    ) => {
      const logger = createStderrLogger(options.logLevel);
      const result = await runScanCommand(
        root,
        {
          format: options.json === true ? "json" : options.format,
          remote: options.remote,
          remoteRetries: options.remoteRetries,
          ...(options.githubToken === undefined ? {} : { githubToken: options.githubToken }),
        },
        logger,
      );

      if (result.status === "empty") {
        process.exitCode = 1;
        return;
      }

      if (options.output === undefined) {
        process.stdout.write(`${result.output}\n`);
        return;
      }

      await writeFile(options.output, `${result.output}\n`, "utf8");
      logger.info(`report written to ${options.output}`);
    },
  );

const executablePath = process.argv[0] ?? "";
const scriptPath = process.argv[1] ?? "";

const argv =
  process.argv[2] === "--"
    ? [executablePath, scriptPath, ...process.argv.slice(3)]
    : process.argv;

if (argv.length <= 2) {
  program.outputHelp();
  process.exit(0);
}

await program.parseAsync(argv);
