/**
 * Command-line interface.
 *
 * scholar-harvest <query> [--years-back N | --year-range R | --month-range M]
 *   [--max-results N] [--output FILE] [--download-pdfs] [--pdf-mode MODE] [--pdf-dir DIR]
 */

import { parseArgs } from "node:util";
import { loadConfig } from "./config.js";
import { ConfigError, errorMessage } from "./errors.js";
import { createLogger } from "./logger.js";
import { type HarvestDependencies, type HarvestOptions, type HarvestOutcome, runHarvest } from "./pipeline.js";
import { serializeExport } from "./export.js";
import type { AccessMode } from "./types.js";

export const USAGE = `Usage: scholar-harvest <query> [options]

Search peer-reviewed literature on Semantic Scholar and optionally download PDFs.

Time filter (choose one):
  -y, --years-back <n>       Search the last n years (default: 10)
  -r, --year-range <range>   Specific years, e.g. 2019 or 2020-2025
  -m, --month-range <range>  Specific months, e.g. 2025-01-2025-06

Options:
  -n, --max-results <n>      Maximum results (default: 20)
  -o, --output <file>        Save JSON results (checkpointed every 5 papers)
      --download-pdfs        Download PDFs of found papers
      --pdf-mode <mode>      open_access (default) or university_access
      --pdf-dir <dir>        PDF directory (default: derived from the query)
      --no-enhance           Search with the query as given
  -h, --help                 Show this help
`;

export type CliCommand = { kind: "help" } | { kind: "run"; options: HarvestOptions };

/** Writable text sinks used by the CLI. */
export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

function parseInteger(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (!/^-?\d+$/.test(value.trim())) {
    throw new ConfigError(`--${name} must be an integer, got "${value}"`);
  }
  return Number(value);
}

function parsePdfMode(value: string | undefined): AccessMode | undefined {
  if (value === undefined) return undefined;
  if (value === "open_access" || value === "university_access") return value;
  throw new ConfigError(`--pdf-mode must be open_access or university_access, got "${value}"`);
}

function parseOptions(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        "years-back": { type: "string", short: "y" },
        "year-range": { type: "string", short: "r" },
        "month-range": { type: "string", short: "m" },
        "max-results": { type: "string", short: "n" },
        output: { type: "string", short: "o" },
        "download-pdfs": { type: "boolean" },
        "pdf-mode": { type: "string" },
        "pdf-dir": { type: "string" },
        "no-enhance": { type: "boolean" },
        help: { type: "boolean", short: "h" },
      },
    });
  } catch (err) {
    throw new ConfigError(errorMessage(err));
  }
}

/**
 * Parse command-line arguments.
 * Time options keep `undefined` when not given so that conflicts can be detected.
 *
 * @throws ConfigError for unknown options or invalid values
 */
export function parseCliArgs(argv: string[]): CliCommand {
  const { values, positionals } = parseOptions(argv);
  if (values.help) return { kind: "help" };

  const query = positionals.join(" ").trim();
  if (!query) throw new ConfigError("A search query is required");

  return {
    kind: "run",
    options: {
      query,
      yearsBack: parseInteger("years-back", values["years-back"]),
      yearRange: values["year-range"],
      monthRange: values["month-range"],
      maxResults: parseInteger("max-results", values["max-results"]),
      outputPath: values.output,
      downloadPdfs: values["download-pdfs"] ?? false,
      pdfMode: parsePdfMode(values["pdf-mode"]),
      pdfDir: values["pdf-dir"],
      enhance: !values["no-enhance"],
    },
  };
}

/** Human-readable summary printed after a run. */
export function formatSummary(outcome: HarvestOutcome, options: HarvestOptions): string {
  const doc = outcome.export;
  const lines = [
    "--- Search Results Summary ---",
    `Query: ${doc.search_query}`,
    `Period: ${doc.search_period ?? "unknown"}`,
    `Papers found: ${doc.total_results}`,
  ];

  if (options.outputPath) lines.push(`Results saved to: ${options.outputPath}`);

  if (doc.pdf_downloads.enabled) {
    const stats = doc.pdf_downloads.statistics;
    lines.push(
      "",
      "PDF Download Summary:",
      `  Total attempts: ${stats.total_attempts}`,
      `  Successful: ${stats.successful_downloads}`,
      `  Open access: ${stats.open_access_found}`
    );
    if (doc.pdf_downloads.mode === "university_access") {
      lines.push(`  University access: ${stats.university_access_used}`);
    }
    lines.push(`  Failed: ${stats.failed_downloads}`, `  PDFs saved to: ${doc.pdf_downloads.directory}`);

    if (outcome.failureReasons.length > 0) {
      lines.push("", "Common failure reasons:");
      for (const { reason, count } of outcome.failureReasons) {
        lines.push(`  • ${reason}: ${count} papers`);
      }
    }
    if (outcome.pdfReportPath) lines.push(`  PDF report saved to: ${outcome.pdfReportPath}`);
  }

  return lines.join("\n") + "\n";
}

const defaultIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

/**
 * Run the CLI and return the process exit code.
 * Exit codes: 0 success, 1 run failure, 2 invalid usage or configuration.
 */
export async function main(
  argv: string[],
  io: CliIo = defaultIo,
  deps?: Partial<HarvestDependencies>
): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (err) {
    io.stderr(`Error: ${errorMessage(err)}\n\n${USAGE}`);
    return 2;
  }

  if (command.kind === "help") {
    io.stdout(USAGE);
    return 0;
  }

  let config: HarvestDependencies["config"];
  try {
    config = deps?.config ?? loadConfig();
  } catch (err) {
    io.stderr(`Error: ${errorMessage(err)}\n`);
    return 2;
  }

  const logger = deps?.logger ?? createLogger({ level: config.logLevel });
  const harvestDeps: HarvestDependencies = {
    onSearchProgress: ({ processed, total, collected }) =>
      logger.info({ processed, total, collected }, `Processed ${processed}/${total} papers`),
    onPdfProgress: ({ completed, total, title, attempt }) =>
      logger.info(
        { completed, total, title, outcome: attempt.outcome.kind, source: attempt.sourceThatSucceeded },
        `PDF ${completed}/${total}: ${attempt.outcome.kind}`
      ),
    ...deps,
    config,
    logger,
  };

  try {
    const outcome = await runHarvest(command.options, harvestDeps);
    if (command.options.outputPath) {
      io.stdout(formatSummary(outcome, command.options));
    } else {
      io.stdout(serializeExport(outcome.export));
    }
    return 0;
  } catch (err) {
    io.stderr(`Error: ${errorMessage(err)}\n`);
    return err instanceof ConfigError ? 2 : 1;
  }
}
