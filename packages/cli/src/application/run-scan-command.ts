import type { Logger, ScanEntry } from "@repohealth/core";
import { createScanReport, formatReport, type ReportFormat, type ScanReport } from "@repohealth/reporter";
import {
  createScanDependencies,
  resolveScanRoot,
  scanRepositories,
  type ScanDependencies,
} from "@repohealth/scanner";

export type ScanCommandOptions = {
  format: ReportFormat;
  remote: boolean;
  githubToken?: string;
  remoteRetries?: number;
  generatedAt?: string;
};

export const DEFAULT_REMOTE_RETRIES = 1;

export const parseRetryCount = (value: string): number => {
  const count = Number.parseInt(value, 10);
  return Number.isFinite(count) && count >= 0 ? count : DEFAULT_REMOTE_RETRIES;
};

export type ScanCommandResult =
  | { status: "completed"; report: ScanReport; output: string }
  | { status: "empty"; rootPath: string };

export const formatScoreNotice = (name: string, score: number): string =>
  `✔ ${name} (Score: ${score.toFixed(1)}/10)`;

export const createScanProgressReporter = (logger: Logger): ((entry: ScanEntry) => void) => {
  return (entry) => {
    if (entry.kind === "project") {
      logger.info(formatScoreNotice(entry.record.name, entry.record.health.score));
      logger.debug(`${entry.record.name}: ${entry.record.dependencies.summary}`);
      return;
    }

    const notice = `skipped ${entry.name} (${entry.reason})`;
    if (entry.reason === "not_git_repository") {
      logger.debug(notice);
    } else {
      logger.info(notice);
    }
  };
};

export const runScanCommand = async (
  inputPath: string | undefined,
  options: ScanCommandOptions,
  logger: Logger,
  dependencies?: ScanDependencies,
): Promise<ScanCommandResult> => {
  const invocationCwd = process.env["INIT_CWD"] ?? process.cwd();
  const rootPath = resolveScanRoot(inputPath ?? ".", invocationCwd);
  logger.info(`scanning repositories under ${rootPath}`);
  if (!options.remote) {
    logger.debug("remote metadata disabled");
  }

  const scan = await scanRepositories(
    { rootPath },
    dependencies ??
      createScanDependencies({
        logger,
        remoteEnabled: options.remote,
        ...(options.githubToken === undefined ? {} : { githubToken: options.githubToken }),
        ...(options.remoteRetries === undefined ? {} : { remoteRetries: options.remoteRetries }),
      }),
    createScanProgressReporter(logger),
  );

  if (scan.projects.length === 0) {
    logger.error("no projects found");
    return { status: "empty", rootPath };
  }

  const report = createScanReport(
    scan,
    options.generatedAt === undefined ? {} : { generatedAt: options.generatedAt },
  );
  logger.info(
    `scan completed (${report.totals.total} projects, ${report.skipped.length} skipped)`,
  );

  return { status: "completed", report, output: formatReport(report, options.format) };
};
