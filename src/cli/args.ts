export interface CliOptions {
  configJson?: string;
  configPath?: string;
  help: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export const USAGE = `Usage: media-relate (--config-json <json> | --config <file>)

Reads <resultsDirectory>/Consolidate_Meta_Results.json and writes
<resultsDirectory>/relationship_sets.json.

Options:
  --config-json <json>  Pipeline configuration as a JSON string
  --config <file>       Path to a pipeline configuration file
  -h, --help            Show this message`;

/** Parse CLI arguments. `argv` excludes the node binary and script path. */
export function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];

    switch (arg) {
      case "--config-json":
        if (next === undefined) {
          throw new UsageError("--config-json requires a value");
        }
        options.configJson = next;
        i++;
        break;
      case "--config":
        if (next === undefined) {
          throw new UsageError("--config requires a value");
        }
        options.configPath = next;
        i++;
        break;
      case "-h":
      case "--help":
        options.help = true;
        break;
      default:
        throw new UsageError(`Unknown argument: ${arg}`);
    }
  }

  if (options.help) {
    return options;
  }
  if (options.configJson !== undefined && options.configPath !== undefined) {
    throw new UsageError("Pass either --config-json or --config, not both");
  }
  if (options.configJson === undefined && options.configPath === undefined) {
    throw new UsageError("Missing --config-json or --config");
  }

  return options;
}
