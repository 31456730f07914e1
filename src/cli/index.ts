import { loadConfig } from "../config";
import {
  ExportFormat,
  readTitlesFile,
  runBatchCommand,
  runDiscoverCommand,
  runExportCommand,
  runReindexCommand,
  runSearchCommand,
  runStatsCommand,
} from "../core/commands";
import { KnowledgeService } from "../core/service";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import { PlaywrightBrowserLauncher, StdinOperatorConfirmation } from "../session";
import { createSink } from "../sink";
import { createStore } from "../store";

export type CommandName = "run" | "search" | "discover" | "stats" | "export" | "reindex";

export interface ParsedCliArgs {
  command: CommandName;
  positionals: string[];
  configPath?: string;
  limit?: number;
  expandSynonyms: boolean;
  titlesFile?: string;
  format: ExportFormat;
}

const HELP_TEXT = `
Usage:
  kb-harvester <command> [options]

Commands:
  run <title...>       Find, extract and store one article per title
  search <query>       Search the stored corpus
  discover <query>     List article candidates on the site without extracting
  stats                Corpus totals
  export               Write CSV and/or xlsx exports of the corpus
  reindex              Rebuild the index from stored entries

Options:
  --config <path>      Optional path to JSON config file
  --limit <n>          Max titles processed by run (default MAX_ARTICLES_PER_RUN)
  --synonyms           Also try synonym variants when direct search finds nothing
  --file <path>        Read titles for run from a file, one per line
  --format <fmt>       Export format: csv, xlsx or all (default all)
  -h, --help           Show this help
`;

const COMMANDS: readonly CommandName[] = ["run", "search", "discover", "stats", "export", "reindex"];
const VALUE_OPTIONS = new Set(["--config", "--limit", "--file", "--format"]);

function parseCommand(raw: string | undefined): CommandName | undefined {
  return COMMANDS.find((command) => command === raw);
}

function parseFormat(raw: string | undefined): ExportFormat | undefined {
  if (raw === undefined) {
    return "all";
  }
  if (raw === "csv" || raw === "xlsx" || raw === "all") {
    return raw;
  }
  return undefined;
}

function optionValue(argv: string[], name: string): string | undefined {
  const index = argv.indexOf(name);
  return index >= 0 ? argv[index + 1] : undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  const format = parseFormat(optionValue(argv, "--format"));
  if (!format) {
    return "help";
  }

  const positionals: string[] = [];
  for (let index = 1; index < argv.length; index += 1) {
    const arg = argv[index];
    if (VALUE_OPTIONS.has(arg)) {
      index += 1;
      continue;
    }
    if (!arg.startsWith("--")) {
      positionals.push(arg);
    }
  }

  const limitRaw = optionValue(argv, "--limit");
  const limitParsed = limitRaw ? Number.parseInt(limitRaw, 10) : undefined;

  return {
    command,
    positionals,
    configPath: optionValue(argv, "--config"),
    limit: Number.isFinite(limitParsed) ? limitParsed : undefined,
    expandSynonyms: argv.includes("--synonyms"),
    titlesFile: optionValue(argv, "--file"),
    format,
  };
}

export async function runCli(argv: string[]): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  const config = loadConfig(parsed.configPath);
  const runId = createRunId();
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId }, { minLevel: config.logLevel });
  const store = createStore(config, logger.child("store"), metrics);
  const sink = createSink(config);
  const service = new KnowledgeService({
    config,
    store,
    sink,
    launcher: new PlaywrightBrowserLauncher(config),
    operator: new StdinOperatorConfirmation(),
    logger,
    metrics,
    runIdFactory: () => runId,
  });
  const context = { runId, config, store, sink, logger, metrics, service };
  const query = parsed.positionals.join(" ").trim();

  logger.info("command_start", {
    command: parsed.command,
    limit: parsed.limit,
    expandSynonyms: parsed.expandSynonyms,
    format: parsed.format,
  });

  try {
    switch (parsed.command) {
      case "run": {
        const titles = parsed.titlesFile ? readTitlesFile(parsed.titlesFile) : parsed.positionals;
        if (titles.length === 0) {
          console.error("run needs at least one title (positional or --file)");
          return 1;
        }
        const result = await runBatchCommand({ ...context, logger: logger.child("run") }, titles, {
          limit: parsed.limit,
          expandSynonyms: parsed.expandSynonyms,
        });
        if (result.aborted) {
          return 2;
        }
        break;
      }
      case "search":
        if (!query) {
          console.error("search needs a query");
          return 1;
        }
        await runSearchCommand({ ...context, logger: logger.child("search") }, query);
        break;
      case "discover":
        if (!query) {
          console.error("discover needs a query");
          return 1;
        }
        await runDiscoverCommand({ ...context, logger: logger.child("discover") }, query, parsed.expandSynonyms);
        break;
      case "stats":
        await runStatsCommand({ ...context, logger: logger.child("stats") });
        break;
      case "export":
        await runExportCommand({ ...context, logger: logger.child("export") }, parsed.format);
        break;
      case "reindex":
        await runReindexCommand({ ...context, logger: logger.child("reindex") });
        break;
      default:
        console.error(`Unsupported command: ${parsed.command}`);
        return 1;
    }

    logger.info("command_complete", { command: parsed.command });
    return 0;
  } finally {
    metrics.printSummary();
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
