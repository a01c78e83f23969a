import { InputFormatError } from "./errors";

const KNOWN_FLAGS = ["--date", "--start-time", "--format"];

export type OutputFormat = "json" | "text";

export interface CliArgs {
  date?: string;
  startTime?: string;
  format: OutputFormat;
  help: boolean;
}

/**
 * Parse `--date YYYY-MM-DD --start-time HH:MM [--format json|text]`.
 * Flags also accept the `--flag=value` form.
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const parsed: CliArgs = { format: "json", help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--help" || arg === "-h") {
      parsed.help = true;
      continue;
    }

    const [flag, inline] = arg.split(/=(.*)/s, 2);
    if (!KNOWN_FLAGS.includes(flag)) {
      throw new InputFormatError(`Unknown option ${flag}`);
    }
    const value = inline ?? argv[++i];
    if (value === undefined || value.startsWith("--")) {
      throw new InputFormatError(`Missing value for ${flag}`);
    }

    switch (flag) {
      case "--date":
        parsed.date = value;
        break;
      case "--format":
        if (value !== "json" && value !== "text") {
          throw new InputFormatError(`Unknown format "${value}", expected json or text`);
        }
        parsed.format = value;
        break;
      case "--start-time":
        parsed.startTime = value;
        break;
    }
  }

  return parsed;
}
